import { describe, expect, it } from "vitest";
import { isAdmin, verifyAdmin } from "../src/services/auth.service.js";

const admin = { username: "admin", password: "test-secret" };

describe("Auth Service", () => {
  describe("verifyAdmin", () => {
    it("should accept the configured credentials", () => {
      expect(verifyAdmin(admin, "admin", "test-secret")).toBe(true);
    });

    it("should reject a wrong password or username", () => {
      expect(verifyAdmin(admin, "admin", "test-secre")).toBe(false);
      expect(verifyAdmin(admin, "root", "test-secret")).toBe(false);
    });
  });

  describe("isAdmin", () => {
    it("should only recognize the configured username", () => {
      expect(isAdmin(admin, "admin")).toBe(true);
      expect(isAdmin(admin, "other")).toBe(false);
      expect(isAdmin(admin, undefined)).toBe(false);
    });
  });
});
