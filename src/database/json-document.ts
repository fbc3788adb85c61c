import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import { StoreCorruptionError, errorMessage } from '../utils/errors.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON file validated by a zod schema. Writes replace the whole file
 * through a temporary sibling and a rename, so a crash leaves either the old
 * or the new document on disk.
 */
export class JsonDocument<TSchema extends z.ZodTypeAny> {
  constructor(
    readonly filePath: string,
    private readonly schema: TSchema
  ) {}

  /**
   * Returns null when the file does not exist yet.
   */
  async read(): Promise<z.output<TSchema> | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new StoreCorruptionError(this.filePath, errorMessage(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StoreCorruptionError(this.filePath, `invalid JSON (${errorMessage(error)})`);
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.errors
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new StoreCorruptionError(this.filePath, issues);
    }

    return result.data;
  }

  async write(data: z.output<TSchema>): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
    await fs.rename(tempPath, this.filePath);
  }
}
