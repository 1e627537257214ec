import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import type { z } from 'zod/v4';
import { SolarCalcError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

export class JsonStoreError extends SolarCalcError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'JsonStoreError';
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Typed JSON file persistence. Every document is validated against a zod
 * schema on the way in and on the way out. Writes go to a sibling temp file
 * first and are renamed into place, so readers never see half a document.
 */
export const JsonStore = {
  /**
   * @throws JsonStoreError if the file is missing, unreadable, not JSON, or fails validation
   */
  read<T>(path: string, schema: z.ZodType<T>): T {
    if (!existsSync(path)) {
      throw new JsonStoreError(`File not found: ${path}`, path);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      const what = err instanceof SyntaxError ? 'Invalid JSON in file' : 'Failed to read file';
      throw new JsonStoreError(`${what}: ${path}`, path, err);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new JsonStoreError(`Validation failed for ${path}: ${describeIssues(result.error)}`, path, result.error);
    }
    return result.data;
  },

  /**
   * Validate and write, creating parent directories as needed.
   * @throws JsonStoreError if validation or the write fails; nothing is written then
   */
  write<T>(path: string, data: T, schema: z.ZodType<T>): void {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new JsonStoreError(
        `Validation failed before write to ${basename(path)}: ${describeIssues(result.error)}`,
        path,
        result.error,
      );
    }

    JsonStore.ensureDir(dirname(path));
    const tmpPath = `${path}.${process.pid}.tmp`;
    try {
      writeFileSync(tmpPath, JSON.stringify(result.data, null, 2) + '\n', 'utf-8');
      renameSync(tmpPath, path);
    } catch (err) {
      throw new JsonStoreError(`Failed to write file: ${path}`, path, err);
    }
  },

  exists(path: string): boolean {
    return existsSync(path);
  },

  /**
   * Read every `.json` file directly under `dir`. Files that fail to parse or
   * validate are skipped with a warning; a missing directory lists as empty.
   * @throws JsonStoreError if the directory exists but cannot be read
   */
  list<T>(dir: string, schema: z.ZodType<T>): T[] {
    if (!existsSync(dir)) return [];

    let files: string[];
    try {
      files = readdirSync(dir).filter((f) => f.endsWith('.json')).sort();
    } catch (err) {
      throw new JsonStoreError(`Failed to read directory: ${dir}`, dir, err);
    }

    const results: T[] = [];
    for (const file of files) {
      try {
        results.push(JsonStore.read(join(dir, file), schema));
      } catch (err) {
        logger.warn(`Skipping invalid file "${file}" in ${dir}`, {
          file,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
    return results;
  },

  ensureDir(dir: string): void {
    mkdirSync(dir, { recursive: true });
  },
};
