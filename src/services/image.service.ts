import { mkdir, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import logger from "../config/logger.js";
import { isNotFound } from "../data/json-collection.js";

export const UPLOADS_URL_PREFIX = "/uploads";

// Extensions we try to re-encode; anything else is stored untouched
export const CONVERTIBLE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".bmp", ".gif", ".tiff"];

export const WEBP_QUALITY = 85;

/** The parts of an uploaded file the store needs (a multer file satisfies this). */
export interface UploadedImage {
  originalname: string;
  buffer: Buffer;
}

export interface StoredImage {
  filename: string;
  /** false when the original bytes were kept instead of a WebP copy */
  converted: boolean;
}

/**
 * Reduces an uploaded name to a safe basename: no directories, only
 * ASCII letters, digits, dots, dashes and underscores.
 */
export function sanitizeFilename(name: string): string {
  const base = path.basename(name.replace(/\\/g, "/"));
  return base
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9._-]/g, "")
    .replace(/^[._]+/, "");
}

export class ImageStore {
  constructor(readonly directory: string) {}

  async save(file: UploadedImage, basename: string): Promise<StoredImage> {
    await mkdir(this.directory, { recursive: true });

    const extension = path.extname(sanitizeFilename(file.originalname)).toLowerCase();

    if (CONVERTIBLE_EXTENSIONS.includes(extension)) {
      const filename = `${basename}.webp`;
      try {
        await toWebp(file.buffer, path.join(this.directory, filename));
        return { filename, converted: true };
      } catch (err) {
        logger.warn("WebP conversion failed, keeping original image", {
          file: file.originalname,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    const filename = `${basename}${extension}`;
    await writeFile(path.join(this.directory, filename), file.buffer);
    return { filename, converted: false };
  }

  urlFor(filename: string): string {
    return `${UPLOADS_URL_PREFIX}/${filename}`;
  }

  /** Deletes the file behind an image URL. Missing files are ignored. */
  async remove(imageUrl: string | undefined): Promise<void> {
    if (!imageUrl) return;
    const filename = sanitizeFilename(imageUrl);
    if (!filename) return;

    try {
      await unlink(path.join(this.directory, filename));
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }
}

async function toWebp(input: Buffer, destination: string): Promise<void> {
  let image = sharp(input);
  const metadata = await image.metadata();

  // Reported for palette PNG and GIF input; not declared in sharp's Metadata type
  if ("paletteBitDepth" in metadata && typeof metadata.paletteBitDepth === "number") {
    image = image.toColourspace("srgb").ensureAlpha();
  }

  await image.webp({ quality: WEBP_QUALITY }).toFile(destination);
}
