import path from "node:path";
import { JsonCollection } from "./json-collection.js";
import { productSchema, type Product } from "./products.js";
import { categorySchema, type Category } from "./categories.js";
import { ImageStore } from "../services/image.service.js";

export interface Catalog {
  products: JsonCollection<Product>;
  categories: JsonCollection<Category>;
  images: ImageStore;
}

export function openCatalog(dataDir: string): Catalog {
  return {
    products: new JsonCollection(path.join(dataDir, "products.json"), productSchema),
    categories: new JsonCollection(path.join(dataDir, "categories.json"), categorySchema),
    images: new ImageStore(path.join(dataDir, "uploads")),
  };
}
