import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import logger from "../config/logger.js";

export interface Identified {
  id: number;
}

/**
 * One JSON file holding a whole collection. Every mutation is a full
 * read-modify-write of the file; there is no locking, so concurrent writers
 * can clobber each other.
 */
export class JsonCollection<T extends Identified> {
  constructor(
    readonly filePath: string,
    private readonly itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) {}

  /**
   * Reads every record. A missing or unparsable file, or one that does not
   * hold an array, is reset to an empty collection on disk. Records that
   * fail the schema are skipped and the file is left as it is.
   */
  async load(): Promise<T[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        await this.save([]);
        return [];
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return this.reset("invalid JSON");
    }

    if (!Array.isArray(parsed)) {
      return this.reset("not an array");
    }

    const items: T[] = [];
    parsed.forEach((record: unknown, index) => {
      const result = this.itemSchema.safeParse(record);
      if (result.success) {
        items.push(result.data);
        return;
      }
      logger.warn("Skipping invalid record", {
        file: this.filePath,
        index,
        reason: result.error.issues[0]?.message ?? "schema mismatch",
      });
    });
    return items;
  }

  async save(items: T[]): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(items, null, 4), "utf-8");
  }

  private async reset(reason: string): Promise<T[]> {
    logger.warn("Resetting corrupt data file", { file: this.filePath, reason });
    await this.save([]);
    return [];
  }
}

export function nextId(items: readonly Identified[]): number {
  return items.length > 0 ? Math.max(...items.map((item) => item.id)) + 1 : 1;
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
