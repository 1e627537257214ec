import type { z } from 'zod/v4';
import type { IPersistence } from '@domain/ports/persistence.js';

/**
 * In-memory IPersistence for unit tests.
 *
 * Documents are kept by path, validated on write and re-validated on read,
 * like JsonStore. `list(dir)` sees direct children of `dir` only.
 *
 * ```ts
 * const persistence = new MemoryPersistence();
 * const store = new ReportStore('/project/.solarcalc/reports', persistence);
 * ```
 */
export class MemoryPersistence implements IPersistence {
  private readonly files = new Map<string, unknown>();

  read<T>(filePath: string, schema: z.ZodType<T>): T {
    if (!this.files.has(filePath)) {
      throw new Error(`File not found: ${filePath}`);
    }
    return schema.parse(this.files.get(filePath));
  }

  write<T>(filePath: string, data: T, schema: z.ZodType<T>): void {
    // Round-trip through JSON so stored values behave like files on disk.
    this.files.set(filePath, JSON.parse(JSON.stringify(schema.parse(data))));
  }

  exists(filePath: string): boolean {
    return this.files.has(filePath);
  }

  list<T>(dirPath: string, schema: z.ZodType<T>): T[] {
    const prefix = dirPath.endsWith('/') ? dirPath : `${dirPath}/`;
    return [...this.files.entries()]
      .filter(([path]) => path.startsWith(prefix) && !path.slice(prefix.length).includes('/'))
      .sort(([a], [b]) => a.localeCompare(b))
      .flatMap(([, value]) => {
        const parsed = schema.safeParse(value);
        return parsed.success ? [parsed.data] : [];
      });
  }

  ensureDir(_dirPath: string): void {}
}
