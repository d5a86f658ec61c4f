import { Router, type RequestHandler } from "express";
import type { Catalog } from "../data/catalog.js";
import { asyncHandler } from "../middleware/async-handler.js";
import { categoryExists, getAllCategories } from "../services/category.service.js";
import {
  createProduct,
  deleteProduct,
  getAllProducts,
  getProductById,
  updateProduct,
} from "../services/product.service.js";
import { productFormSchema, validationErrorBody } from "../validation/catalog.schemas.js";
import { conversionWarnings } from "./messages.js";

const unknownCategory = {
  success: false,
  message: "Invalid form data",
  errors: { category_id: ["Category does not exist"] },
};

export function createProductRouter(catalog: Catalog, upload: RequestHandler): Router {
  const router = Router();

  // GET /api/admin/products
  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      const products = await getAllProducts(catalog);
      const categories = await getAllCategories(catalog);
      res.json({ success: true, data: { products, categories } });
    }),
  );

  // POST /api/admin/products
  router.post(
    "/",
    upload,
    asyncHandler(async (req, res) => {
      if (!req.file || !req.file.originalname) {
        res.status(400).json({ success: false, message: "Image is required" });
        return;
      }

      const parsed = productFormSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json(validationErrorBody(parsed.error));
        return;
      }
      if (!(await categoryExists(catalog, parsed.data.category_id))) {
        res.status(400).json(unknownCategory);
        return;
      }

      const { product, imageConverted } = await createProduct(catalog, parsed.data, req.file);
      res.status(201).json({
        success: true,
        data: product,
        message: "Product created",
        warnings: conversionWarnings(imageConverted),
      });
    }),
  );

  // GET /api/admin/products/:id
  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const product = await getProductById(catalog, Number(req.params.id));
      if (!product) {
        res.status(404).json({ success: false, message: "Product not found" });
        return;
      }
      const categories = await getAllCategories(catalog);
      res.json({ success: true, data: { product, categories } });
    }),
  );

  // PUT /api/admin/products/:id
  router.put(
    "/:id",
    upload,
    asyncHandler(async (req, res) => {
      const id = Number(req.params.id);
      if (!(await getProductById(catalog, id))) {
        res.status(404).json({ success: false, message: "Product not found" });
        return;
      }

      const parsed = productFormSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json(validationErrorBody(parsed.error));
        return;
      }
      if (!(await categoryExists(catalog, parsed.data.category_id))) {
        res.status(400).json(unknownCategory);
        return;
      }

      const image = req.file && req.file.originalname ? req.file : undefined;
      const change = await updateProduct(catalog, id, parsed.data, image);
      if (!change) {
        res.status(404).json({ success: false, message: "Product not found" });
        return;
      }
      res.json({
        success: true,
        data: change.product,
        message: "Product updated",
        warnings: conversionWarnings(change.imageConverted),
      });
    }),
  );

  // DELETE /api/admin/products/:id
  router.delete(
    "/:id",
    asyncHandler(async (req, res) => {
      await deleteProduct(catalog, Number(req.params.id));
      res.json({ success: true, message: "Product deleted" });
    }),
  );

  return router;
}
