import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import { openCatalog, type Catalog } from "../src/data/catalog.js";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "catalog-test-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function makeTempCatalog(): Promise<{ dir: string; catalog: Catalog }> {
  const dir = await makeTempDir();
  return { dir, catalog: openCatalog(dir) };
}

export function pngBuffer(width = 4, height = 3): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 4, background: { r: 200, g: 40, b: 40, alpha: 1 } },
  })
    .png()
    .toBuffer();
}

export function palettePngBuffer(width = 5, height = 2): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 4, background: { r: 0, g: 120, b: 255, alpha: 0.5 } },
  })
    .png({ palette: true })
    .toBuffer();
}
