import logger from "../config/logger.js";
import type { Catalog } from "../data/catalog.js";
import { nextId } from "../data/json-collection.js";
import type { Product } from "../data/products.js";
import type { UploadedImage } from "./image.service.js";

export const FEATURED_LIMIT = 4;

export interface ProductInput {
  name: string;
  description: string;
  price: number;
  category_id: number;
}

export interface ProductChange {
  product: Product;
  /** Set only when a new image was stored */
  imageConverted?: boolean;
}

export function getAllProducts(catalog: Catalog): Promise<Product[]> {
  return catalog.products.load();
}

export async function getProductById(catalog: Catalog, id: number): Promise<Product | undefined> {
  const products = await catalog.products.load();
  return products.find((product) => product.id === id);
}

export async function getProductsByCategory(catalog: Catalog, categoryId: number): Promise<Product[]> {
  const products = await catalog.products.load();
  return products.filter((product) => product.category_id === categoryId);
}

/** Most viewed first; equal counts keep their stored order. */
export function pickFeatured(products: readonly Product[], limit = FEATURED_LIMIT): Product[] {
  return [...products].sort((a, b) => b.views - a.views).slice(0, limit);
}

export async function createProduct(
  catalog: Catalog,
  input: ProductInput,
  image: UploadedImage,
): Promise<ProductChange> {
  const products = await catalog.products.load();
  const id = nextId(products);

  const stored = await catalog.images.save(image, `product_${id}`);
  const product: Product = {
    id,
    name: input.name,
    description: input.description,
    price: input.price,
    image: catalog.images.urlFor(stored.filename),
    category_id: input.category_id,
    views: 0,
  };

  products.push(product);
  await catalog.products.save(products);
  logger.info("Product created", { id, converted: stored.converted });

  return { product, imageConverted: stored.converted };
}

export async function updateProduct(
  catalog: Catalog,
  id: number,
  input: ProductInput,
  image?: UploadedImage,
): Promise<ProductChange | undefined> {
  const products = await catalog.products.load();
  const product = products.find((p) => p.id === id);
  if (!product) return undefined;

  product.name = input.name;
  product.description = input.description;
  product.price = input.price;
  product.category_id = input.category_id;

  let imageConverted: boolean | undefined;
  if (image) {
    await catalog.images.remove(product.image);
    const stored = await catalog.images.save(image, `product_${id}_${unixSeconds()}`);
    product.image = catalog.images.urlFor(stored.filename);
    imageConverted = stored.converted;
  }

  await catalog.products.save(products);
  logger.info("Product updated", { id });

  return imageConverted === undefined ? { product } : { product, imageConverted };
}

/** Returns false when no product had that id; the file is rewritten either way. */
export async function deleteProduct(catalog: Catalog, id: number): Promise<boolean> {
  const products = await catalog.products.load();
  const target = products.find((product) => product.id === id);

  if (target) {
    await catalog.images.remove(target.image);
  }

  await catalog.products.save(products.filter((product) => product.id !== id));
  if (target) logger.info("Product deleted", { id });
  return target !== undefined;
}

export async function recordView(catalog: Catalog, id: number): Promise<Product | undefined> {
  const products = await catalog.products.load();
  const product = products.find((p) => p.id === id);
  if (!product) return undefined;

  product.views += 1;
  await catalog.products.save(products);
  return product;
}

export function unixSeconds(now: number = Date.now()): number {
  return Math.floor(now / 1000);
}
