import { readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Catalog } from "../src/data/catalog.js";
import {
  categoryExists,
  createCategory,
  deleteCategory,
  getAllCategories,
  getCategoryById,
  updateCategory,
} from "../src/services/category.service.js";
import { createProduct, getAllProducts } from "../src/services/product.service.js";
import { makeTempCatalog, pngBuffer, removeTempDir } from "./helpers.js";

describe("Category Service", () => {
  let dir: string;
  let catalog: Catalog;

  beforeEach(async () => {
    ({ dir, catalog } = await makeTempCatalog());
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe("createCategory", () => {
    it("should store the category with a converted image", async () => {
      const { category, imageConverted } = await createCategory(
        catalog,
        { name: "Lighting" },
        { originalname: "lights.png", buffer: await pngBuffer() },
      );

      expect(imageConverted).toBe(true);
      expect(category).toEqual({ id: 1, name: "Lighting", image: "/uploads/category_1.webp" });
      expect(await getAllCategories(catalog)).toEqual([category]);
      expect(await categoryExists(catalog, 1)).toBe(true);
      expect(await categoryExists(catalog, 2)).toBe(false);
    });
  });

  describe("updateCategory", () => {
    it("should rename without touching the image", async () => {
      await catalog.categories.save([{ id: 3, name: "Old", image: "/uploads/category_3.webp" }]);
      const change = await updateCategory(catalog, 3, { name: "New" });
      expect(change).toEqual({ category: { id: 3, name: "New", image: "/uploads/category_3.webp" } });
      expect(await getCategoryById(catalog, 3)).toEqual(change?.category);
    });

    it("should swap the image file", async () => {
      await createCategory(catalog, { name: "Lighting" }, { originalname: "a.png", buffer: await pngBuffer() });
      const change = await updateCategory(catalog, 1, { name: "Lighting" }, {
        originalname: "b.gif",
        buffer: Buffer.from("not an image"),
      });

      expect(change?.imageConverted).toBe(false);
      expect(change?.category.image).toMatch(/^\/uploads\/category_1_\d+\.gif$/);
      const files = await readdir(catalog.images.directory);
      expect(files).toHaveLength(1);
      expect(files[0]).toMatch(/^category_1_\d+\.gif$/);
    });

    it("should return undefined for an unknown category", async () => {
      expect(await updateCategory(catalog, 1, { name: "x" })).toBeUndefined();
    });
  });

  describe("deleteCategory", () => {
    it("should cascade to the category's products and their images", async () => {
      const image = { originalname: "x.png", buffer: await pngBuffer() };
      await createCategory(catalog, { name: "Lighting" }, image);
      await createCategory(catalog, { name: "Chairs" }, image);
      const base = { description: "", price: 5 };
      await createProduct(catalog, { ...base, name: "Lamp", category_id: 1 }, image);
      await createProduct(catalog, { ...base, name: "Stool", category_id: 2 }, image);
      await createProduct(catalog, { ...base, name: "Bulb", category_id: 1 }, image);

      expect(await deleteCategory(catalog, 1)).toBe(2);

      expect((await getAllCategories(catalog)).map((c) => c.id)).toEqual([2]);
      expect((await getAllProducts(catalog)).map((p) => p.name)).toEqual(["Stool"]);
      expect((await readdir(catalog.images.directory)).sort()).toEqual(["category_2.webp", "product_2.webp"]);
    });

    it("should leave the products file alone when nothing cascades", async () => {
      await catalog.categories.save([{ id: 1, name: "Empty", image: "/uploads/category_1.webp" }]);
      const productsFile = path.join(dir, "products.json");
      await writeFile(productsFile, "[ ]", "utf-8");

      expect(await deleteCategory(catalog, 1)).toBe(0);
      expect(await readFile(productsFile, "utf-8")).toBe("[ ]");
      expect(await getAllCategories(catalog)).toEqual([]);
    });

    it("should return undefined for an unknown category", async () => {
      expect(await deleteCategory(catalog, 4)).toBeUndefined();
    });
  });
});
