import { Router, type Request } from "express";
import { rateLimit } from "express-rate-limit";
import { asyncHandler } from "../middleware/async-handler.js";
import { requireAdmin } from "../middleware/auth.js";
import logger from "../config/logger.js";
import { isAdmin, verifyAdmin, type AdminCredentials } from "../services/auth.service.js";
import { loginSchema, validationErrorBody } from "../validation/catalog.schemas.js";

export const SESSION_COOKIE = "catalog.sid";

function regenerateSession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate((err: unknown) => (err ? reject(err) : resolve()));
  });
}

function destroySession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.destroy((err: unknown) => (err ? reject(err) : resolve()));
  });
}

export function createAuthRouter(admin: AdminCredentials): Router {
  const router = Router();

  const loginLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: 10,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    message: { success: false, message: "Too many login attempts" },
  });

  // POST /api/auth/login
  router.post(
    "/login",
    loginLimiter,
    asyncHandler(async (req, res) => {
      const current = req.session.user;
      if (current !== undefined && isAdmin(admin, current)) {
        res.json({ success: true, data: { username: current } });
        return;
      }

      const parsed = loginSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json(validationErrorBody(parsed.error));
        return;
      }

      const { username, password } = parsed.data;
      if (!verifyAdmin(admin, username, password)) {
        logger.warn("Failed admin login", { username });
        res.status(401).json({ success: false, message: "Invalid username or password" });
        return;
      }

      await regenerateSession(req);
      req.session.user = username;
      logger.info("Admin logged in", { username });
      res.json({ success: true, data: { username } });
    }),
  );

  // POST /api/auth/logout
  router.post(
    "/logout",
    requireAdmin(admin),
    asyncHandler(async (req, res) => {
      await destroySession(req);
      res.clearCookie(SESSION_COOKIE);
      res.json({ success: true, message: "Logged out" });
    }),
  );

  // GET /api/auth/me
  router.get("/me", requireAdmin(admin), (req, res) => {
    res.json({ success: true, data: { username: req.session.user } });
  });

  return router;
}
