import dotenv from "dotenv";
dotenv.config();

const NODE_ENV = process.env.NODE_ENV || "development";

export const env = {
  NODE_ENV,
  PORT: parseInt(process.env.PORT || "3000", 10),
  CORS_ORIGIN: process.env.CORS_ORIGIN || "http://localhost:5173",
  REDIS_URL: process.env.REDIS_URL || "redis://localhost:6379",

  // Holds products.json, categories.json and uploads/
  DATA_DIR: process.env.DATA_DIR || "instance",
  SESSION_SECRET: process.env.SESSION_SECRET || "dev-session-secret",
  SESSION_TTL_SECONDS: parseInt(process.env.SESSION_TTL_SECONDS || String(7 * 24 * 60 * 60), 10),
  ADMIN_USERNAME: process.env.ADMIN_USERNAME || "admin",
  ADMIN_PASSWORD: process.env.ADMIN_PASSWORD || "admin",
  MAX_UPLOAD_BYTES: parseInt(process.env.MAX_UPLOAD_BYTES || String(5 * 1024 * 1024), 10),

  isDev: NODE_ENV === "development",
  isProd: NODE_ENV === "production",
  isTest: NODE_ENV === "test",
} as const;
