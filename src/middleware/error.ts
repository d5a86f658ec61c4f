import type { ErrorRequestHandler, RequestHandler } from "express";
import multer from "multer";
import logger from "../config/logger.js";

export const notFound: RequestHandler = (_req, res) => {
  res.status(404).json({ success: false, message: "Route not found" });
};

// body-parser and friends attach an HTTP status to the errors they raise
function clientStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof multer.MulterError) {
    const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
    res.status(status).json({ success: false, message: err.message });
    return;
  }

  const status = clientStatus(err);
  if (status !== undefined) {
    res.status(status).json({ success: false, message: err instanceof Error ? err.message : "Bad request" });
    return;
  }

  logger.error("Unhandled request error", {
    method: req.method,
    path: req.originalUrl,
    error: err instanceof Error ? err.stack ?? err.message : String(err),
  });
  res.status(500).json({ success: false, message: "Internal server error" });
};
