import { Router, type RequestHandler } from "express";
import type { Catalog } from "../data/catalog.js";
import { asyncHandler } from "../middleware/async-handler.js";
import {
  createCategory,
  deleteCategory,
  getAllCategories,
  getCategoryById,
  updateCategory,
} from "../services/category.service.js";
import { categoryFormSchema, validationErrorBody } from "../validation/catalog.schemas.js";
import { conversionWarnings } from "./messages.js";

export function createCategoryRouter(catalog: Catalog, upload: RequestHandler): Router {
  const router = Router();

  // GET /api/admin/categories
  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      const categories = await getAllCategories(catalog);
      res.json({ success: true, data: categories });
    }),
  );

  // POST /api/admin/categories
  router.post(
    "/",
    upload,
    asyncHandler(async (req, res) => {
      if (!req.file || !req.file.originalname) {
        res.status(400).json({ success: false, message: "Category image is required" });
        return;
      }

      const parsed = categoryFormSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json(validationErrorBody(parsed.error));
        return;
      }

      const { category, imageConverted } = await createCategory(catalog, parsed.data, req.file);
      res.status(201).json({
        success: true,
        data: category,
        message: "Category created",
        warnings: conversionWarnings(imageConverted),
      });
    }),
  );

  // GET /api/admin/categories/:id
  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const category = await getCategoryById(catalog, Number(req.params.id));
      if (!category) {
        res.status(404).json({ success: false, message: "Category not found" });
        return;
      }
      res.json({ success: true, data: category });
    }),
  );

  // PUT /api/admin/categories/:id
  router.put(
    "/:id",
    upload,
    asyncHandler(async (req, res) => {
      const id = Number(req.params.id);
      if (!(await getCategoryById(catalog, id))) {
        res.status(404).json({ success: false, message: "Category not found" });
        return;
      }

      const parsed = categoryFormSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json(validationErrorBody(parsed.error));
        return;
      }

      const image = req.file && req.file.originalname ? req.file : undefined;
      const change = await updateCategory(catalog, id, parsed.data, image);
      if (!change) {
        res.status(404).json({ success: false, message: "Category not found" });
        return;
      }
      res.json({
        success: true,
        data: change.category,
        message: "Category updated",
        warnings: conversionWarnings(change.imageConverted),
      });
    }),
  );

  // DELETE /api/admin/categories/:id
  router.delete(
    "/:id",
    asyncHandler(async (req, res) => {
      const deletedProducts = await deleteCategory(catalog, Number(req.params.id));
      if (deletedProducts === undefined) {
        res.status(404).json({ success: false, message: "Category not found" });
        return;
      }
      res.json({
        success: true,
        data: { deletedProducts },
        message: `Category and ${deletedProducts} product(s) deleted`,
      });
    }),
  );

  return router;
}
