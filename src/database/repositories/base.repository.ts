import type { z } from 'zod';
import { StoreCorruptionError } from '../../utils/errors.js';
import type { WriteLock } from '../../utils/write-lock.js';
import type { JsonDocument } from '../json-document.js';

/**
 * Keyed, in-memory view of one JSON document. Subclasses build the next map,
 * `commit` writes it out whole and only then swaps it in, so readers never
 * observe a half-applied mutation.
 */
export abstract class DocumentRepository<TSchema extends z.ZodTypeAny, TEntity> {
  protected entries = new Map<string, TEntity>();

  constructor(
    protected readonly document: JsonDocument<TSchema>,
    protected readonly lock: WriteLock
  ) {}

  protected abstract keyOf(entity: TEntity): string;
  protected abstract fromDocument(document: z.output<TSchema>): TEntity[];
  protected abstract toDocument(entities: TEntity[]): z.output<TSchema>;

  async open(): Promise<void> {
    const stored = await this.document.read();
    const entries = new Map<string, TEntity>();

    if (stored) {
      for (const entity of this.fromDocument(stored)) {
        const key = this.keyOf(entity);
        if (entries.has(key)) {
          throw new StoreCorruptionError(this.document.filePath, `duplicate entry ${key}`);
        }
        entries.set(key, entity);
      }
    }

    this.entries = entries;
  }

  count(): number {
    return this.entries.size;
  }

  protected async commit(next: Map<string, TEntity>): Promise<void> {
    await this.document.write(this.toDocument([...next.values()]));
    this.entries = next;
  }
}
