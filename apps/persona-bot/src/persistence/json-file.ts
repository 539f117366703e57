import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { PersistenceError } from '../utils/errors';

/**
 * A single JSON document on disk, read and rewritten wholesale
 * @template T - Validated shape of the document
 */
export class JsonFile<T> {
  readonly filePath: string;

  constructor(
    filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {
    this.filePath = path.resolve(filePath);
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /**
   * Read and validate the document
   * @returns null when the file does not exist
   * @throws PersistenceError when the file is unreadable, not JSON, or fails validation
   */
  read(): T | null {
    if (!this.exists()) {
      return null;
    }

    let parsed: unknown;
    try {
      const content = fs.readFileSync(this.filePath, 'utf-8');
      parsed = JSON.parse(content);
    } catch (e) {
      throw new PersistenceError(`Could not read ${this.filePath}`, {
        cause: e instanceof Error ? e.message : String(e),
      });
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      throw new PersistenceError(`Invalid document in ${this.filePath}`, result.error.issues);
    }
    return result.data;
  }

  /**
   * Replace the document on disk, creating parent directories as needed
   * @throws PersistenceError when the write fails
   */
  write(data: T, options: { sortKeys?: boolean } = {}): void {
    try {
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      const json = options.sortKeys
        ? JSON.stringify(sortKeysDeep(data), null, 2)
        : JSON.stringify(data, null, 2);
      fs.writeFileSync(this.filePath, json, 'utf-8');
    } catch (e) {
      throw new PersistenceError(`Failed to write ${this.filePath}`, {
        cause: e instanceof Error ? e.message : String(e),
      });
    }
  }
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === 'object') {
    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    const sorted: Record<string, unknown> = {};
    for (const [key, inner] of entries) {
      sorted[key] = sortKeysDeep(inner);
    }
    return sorted;
  }
  return value;
}
