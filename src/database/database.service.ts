import path from 'node:path';
import { FilterSet } from '../utils/filters/index.js';
import { logger } from '../utils/logger/logger.service.js';
import { WriteLock } from '../utils/write-lock.js';
import { batchesDocumentSchema, filtersDocumentSchema, linksDocumentSchema } from './document.schemas.js';
import { JsonDocument } from './json-document.js';
import { BatchRepository, LinkRepository } from './repositories/index.js';

export const LINKS_FILE = 'links.json';
export const FILTERS_FILE = 'filters.json';
export const BATCHES_FILE = 'files.json';

/**
 * Owns the persisted documents in one data directory and the write lock
 * they share.
 */
export class DatabaseService {
  public readonly lock = new WriteLock();
  public readonly links: LinkRepository;
  public readonly filters: FilterSet;
  public readonly batches: BatchRepository;

  constructor(private readonly dataDir: string) {
    this.links = new LinkRepository(
      new JsonDocument(path.join(dataDir, LINKS_FILE), linksDocumentSchema),
      this.lock
    );
    this.filters = new FilterSet(
      new JsonDocument(path.join(dataDir, FILTERS_FILE), filtersDocumentSchema),
      this.lock
    );
    this.batches = new BatchRepository(
      new JsonDocument(path.join(dataDir, BATCHES_FILE), batchesDocumentSchema),
      this.lock
    );
  }

  /**
   * Loads every document. Throws StoreCorruptionError when one is unreadable.
   */
  async open(): Promise<void> {
    try {
      await this.filters.open();
      await this.links.open();
      await this.batches.open();
      logger.info(`Data directory ready: ${this.dataDir}`);
    } catch (error) {
      logger.error('Failed to open data directory:', error);
      throw error;
    }
  }

  healthCheck(): { links: number; filters: number; batches: number; pendingWrites: number } {
    return {
      links: this.links.count(),
      filters: this.filters.size,
      batches: this.batches.count(),
      pendingWrites: this.lock.pendingCount,
    };
  }
}
