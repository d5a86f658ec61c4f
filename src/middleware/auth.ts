import type { RequestHandler } from "express";
import { isAdmin, type AdminCredentials } from "../services/auth.service.js";

declare module "express-session" {
  interface SessionData {
    user: string;
  }
}

export function requireAdmin(admin: AdminCredentials): RequestHandler {
  return (req, res, next) => {
    if (!isAdmin(admin, req.session.user)) {
      res.status(401).json({ success: false, message: "Authentication required" });
      return;
    }
    next();
  };
}
