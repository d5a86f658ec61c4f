import { createHash, timingSafeEqual } from "node:crypto";

export interface AdminCredentials {
  username: string;
  password: string;
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf-8").digest();
}

// Digests keep the buffers equal-length for timingSafeEqual
function safeEqual(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

export function verifyAdmin(admin: AdminCredentials, username: string, password: string): boolean {
  const userOk = safeEqual(username, admin.username);
  const passOk = safeEqual(password, admin.password);
  return userOk && passOk;
}

export function isAdmin(admin: AdminCredentials, username: string | undefined): boolean {
  return username !== undefined && username === admin.username;
}
