import express, { type Express } from "express";
import session from "express-session";
import helmet from "helmet";
import cors from "cors";
import { openCatalog } from "./data/catalog.js";
import { env } from "./config/env.js";
import { requireAdmin } from "./middleware/auth.js";
import { errorHandler, notFound } from "./middleware/error.js";
import { imageUpload } from "./middleware/upload.js";
import { createAuthRouter, SESSION_COOKIE } from "./routes/auth.routes.js";
import { createCatalogRouter } from "./routes/catalog.routes.js";
import { createCategoryRouter } from "./routes/category.routes.js";
import { createProductRouter } from "./routes/product.routes.js";
import type { AdminCredentials } from "./services/auth.service.js";
import { UPLOADS_URL_PREFIX } from "./services/image.service.js";

export interface AppOptions {
  dataDir: string;
  admin: AdminCredentials;
  sessionSecret: string;
  sessionTtlSeconds: number;
  corsOrigin: string;
  maxUploadBytes: number;
  /** Send the session cookie over HTTPS only (behind a proxy in production) */
  secureCookies: boolean;
  /** Defaults to express-session's in-process memory store */
  sessionStore?: session.Store;
  /** Reported by /health */
  redisStatus?: () => string;
}

export function appOptionsFromEnv(): AppOptions {
  return {
    dataDir: env.DATA_DIR,
    admin: { username: env.ADMIN_USERNAME, password: env.ADMIN_PASSWORD },
    sessionSecret: env.SESSION_SECRET,
    sessionTtlSeconds: env.SESSION_TTL_SECONDS,
    corsOrigin: env.CORS_ORIGIN,
    maxUploadBytes: env.MAX_UPLOAD_BYTES,
    secureCookies: env.isProd,
  };
}

export function createApp(options: AppOptions): Express {
  const catalog = openCatalog(options.dataDir);
  const upload = imageUpload(options.maxUploadBytes);

  const app = express();

  if (options.secureCookies) {
    app.set("trust proxy", 1);
  }

  // Images are loaded by the storefront from another origin
  app.use(helmet({ crossOriginResourcePolicy: { policy: "cross-origin" } }));
  app.use(cors({ origin: options.corsOrigin, credentials: true }));

  app.use(express.json({ limit: "10kb" }));
  app.use(express.urlencoded({ extended: true, limit: "10kb" }));

  app.use(
    session({
      name: SESSION_COOKIE,
      secret: options.sessionSecret,
      store: options.sessionStore,
      resave: false,
      saveUninitialized: false,
      cookie: {
        httpOnly: true,
        sameSite: "lax",
        secure: options.secureCookies,
        maxAge: options.sessionTtlSeconds * 1000,
      },
    }),
  );

  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      redis: options.redisStatus ? options.redisStatus() : "disabled",
    });
  });

  app.use(
    UPLOADS_URL_PREFIX,
    express.static(catalog.images.directory, { index: false, dotfiles: "deny" }),
  );

  app.use("/api/auth", createAuthRouter(options.admin));
  app.use("/api/catalog", createCatalogRouter(catalog));

  const admin = requireAdmin(options.admin);
  app.use("/api/admin/products", admin, createProductRouter(catalog, upload));
  app.use("/api/admin/categories", admin, createCategoryRouter(catalog, upload));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
