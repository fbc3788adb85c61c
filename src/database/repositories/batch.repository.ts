import {
  DOCUMENT_VERSION,
  type BatchRecord,
  type BatchesDocument,
  type batchesDocumentSchema,
} from '../document.schemas.js';
import type { IngestionBatch } from '../database.types.js';
import { DocumentRepository } from './base.repository.js';

function cloneBatch(batch: IngestionBatch): IngestionBatch {
  return {
    ...batch,
    processedAt: batch.processedAt ? new Date(batch.processedAt) : null,
    haltedAt: batch.haltedAt ? new Date(batch.haltedAt) : null,
  };
}

/**
 * Ingestion record per source file, keyed by path.
 */
export class BatchRepository extends DocumentRepository<typeof batchesDocumentSchema, IngestionBatch> {
  protected keyOf(batch: IngestionBatch): string {
    return batch.path;
  }

  protected fromDocument(document: BatchesDocument): IngestionBatch[] {
    return document.batches.map(
      (record): IngestionBatch => ({
        path: record.path,
        status: record.status,
        processedAt: record.processed_at ? new Date(record.processed_at) : null,
        haltedAt: record.halted_at ? new Date(record.halted_at) : null,
        resumeIndex: record.resume_index,
        linksFound: record.links_found,
        error: record.error,
      })
    );
  }

  protected toDocument(batches: IngestionBatch[]): BatchesDocument {
    return {
      version: DOCUMENT_VERSION,
      batches: batches.map(
        (batch): BatchRecord => ({
          path: batch.path,
          status: batch.status,
          processed_at: batch.processedAt ? batch.processedAt.toISOString() : null,
          halted_at: batch.haltedAt ? batch.haltedAt.toISOString() : null,
          resume_index: batch.resumeIndex,
          links_found: batch.linksFound,
          error: batch.error,
        })
      ),
    };
  }

  get(path: string): IngestionBatch | undefined {
    const batch = this.entries.get(path);
    return batch ? cloneBatch(batch) : undefined;
  }

  list(): IngestionBatch[] {
    return [...this.entries.values()].map(cloneBatch);
  }

  async save(batch: IngestionBatch): Promise<IngestionBatch> {
    const stored = cloneBatch(batch);

    await this.lock.run(async () => {
      const next = new Map(this.entries);
      next.set(stored.path, stored);
      await this.commit(next);
    });

    return cloneBatch(stored);
  }
}
