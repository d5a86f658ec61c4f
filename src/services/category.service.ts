import logger from "../config/logger.js";
import type { Catalog } from "../data/catalog.js";
import type { Category } from "../data/categories.js";
import { nextId } from "../data/json-collection.js";
import type { Product } from "../data/products.js";
import type { UploadedImage } from "./image.service.js";
import { unixSeconds } from "./product.service.js";

export interface CategoryInput {
  name: string;
}

export interface CategoryChange {
  category: Category;
  imageConverted?: boolean;
}

export function getAllCategories(catalog: Catalog): Promise<Category[]> {
  return catalog.categories.load();
}

export async function getCategoryById(catalog: Catalog, id: number): Promise<Category | undefined> {
  const categories = await catalog.categories.load();
  return categories.find((category) => category.id === id);
}

export async function categoryExists(catalog: Catalog, id: number): Promise<boolean> {
  return (await getCategoryById(catalog, id)) !== undefined;
}

export async function createCategory(
  catalog: Catalog,
  input: CategoryInput,
  image: UploadedImage,
): Promise<CategoryChange> {
  const categories = await catalog.categories.load();
  const id = nextId(categories);

  const stored = await catalog.images.save(image, `category_${id}`);
  const category: Category = {
    id,
    name: input.name,
    image: catalog.images.urlFor(stored.filename),
  };

  categories.push(category);
  await catalog.categories.save(categories);
  logger.info("Category created", { id, converted: stored.converted });

  return { category, imageConverted: stored.converted };
}

export async function updateCategory(
  catalog: Catalog,
  id: number,
  input: CategoryInput,
  image?: UploadedImage,
): Promise<CategoryChange | undefined> {
  const categories = await catalog.categories.load();
  const category = categories.find((c) => c.id === id);
  if (!category) return undefined;

  category.name = input.name;

  let imageConverted: boolean | undefined;
  if (image) {
    await catalog.images.remove(category.image);
    const stored = await catalog.images.save(image, `category_${id}_${unixSeconds()}`);
    category.image = catalog.images.urlFor(stored.filename);
    imageConverted = stored.converted;
  }

  await catalog.categories.save(categories);
  logger.info("Category updated", { id });

  return imageConverted === undefined ? { category } : { category, imageConverted };
}

/**
 * Deletes a category together with its products and every image file they
 * own. Returns the number of products removed, or undefined when the
 * category does not exist.
 */
export async function deleteCategory(catalog: Catalog, id: number): Promise<number | undefined> {
  const categories = await catalog.categories.load();
  const category = categories.find((c) => c.id === id);
  if (!category) return undefined;

  await catalog.images.remove(category.image);
  await catalog.categories.save(categories.filter((c) => c.id !== id));

  const products = await catalog.products.load();
  const kept: Product[] = [];
  let deleted = 0;
  for (const product of products) {
    if (product.category_id === id) {
      await catalog.images.remove(product.image);
      deleted += 1;
    } else {
      kept.push(product);
    }
  }

  if (deleted > 0) {
    await catalog.products.save(kept);
  }

  logger.info("Category deleted", { id, deletedProducts: deleted });
  return deleted;
}
