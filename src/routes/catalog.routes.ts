import { Router } from "express";
import type { Catalog } from "../data/catalog.js";
import { asyncHandler } from "../middleware/async-handler.js";
import { getAllCategories, getCategoryById } from "../services/category.service.js";
import {
  getAllProducts,
  getProductById,
  getProductsByCategory,
  pickFeatured,
  recordView,
} from "../services/product.service.js";

export function createCatalogRouter(catalog: Catalog): Router {
  const router = Router();

  // GET /api/catalog
  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      const products = await getAllProducts(catalog);
      const categories = await getAllCategories(catalog);
      res.json({
        success: true,
        data: { products, categories, featured: pickFeatured(products) },
      });
    }),
  );

  // GET /api/catalog/categories/:id
  router.get(
    "/categories/:id",
    asyncHandler(async (req, res) => {
      const id = Number(req.params.id);
      // Unknown ids answer with a null category
      const category = (await getCategoryById(catalog, id)) ?? null;
      const products = await getProductsByCategory(catalog, id);
      const categories = await getAllCategories(catalog);
      res.json({ success: true, data: { category, products, categories } });
    }),
  );

  // GET /api/catalog/products/:id
  router.get(
    "/products/:id",
    asyncHandler(async (req, res) => {
      const product = await getProductById(catalog, Number(req.params.id));
      if (!product) {
        res.status(404).json({ success: false, message: "Product not found" });
        return;
      }
      res.json({ success: true, data: product });
    }),
  );

  // POST /api/catalog/products/:id/view
  router.post(
    "/products/:id/view",
    asyncHandler(async (req, res) => {
      const product = await recordView(catalog, Number(req.params.id));
      if (!product) {
        res.status(404).json({ success: false, error: "Product not found" });
        return;
      }
      res.json({ success: true, data: { views: product.views } });
    }),
  );

  return router;
}
