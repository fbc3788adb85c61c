import { logger } from '../../utils/logger/logger.service.js';
import { tokenizeUrl } from '../../utils/url-tokenizer.js';
import {
  DOCUMENT_VERSION,
  type LinkRecord,
  type LinksDocument,
  type linksDocumentSchema,
} from '../document.schemas.js';
import type {
  Link,
  LinkChange,
  LinkPredicate,
  LinkStatus,
  LinkStatusPatch,
  LinkUpsert,
  ManualStatus,
} from '../database.types.js';
import { DocumentRepository } from './base.repository.js';

export type LinkListener = (change: LinkChange) => void;

interface Applied<T> {
  changes: LinkChange[];
  value: T;
}

function cloneLink(link: Link): Link {
  return {
    ...link,
    createdAt: new Date(link.createdAt),
    updatedAt: new Date(link.updatedAt),
  };
}

/**
 * Every URL ever seen, keyed by its normalized form. Records are never
 * erased: deletion is a status plus the `deleted` flag.
 */
export class LinkRepository extends DocumentRepository<typeof linksDocumentSchema, Link> {
  private readonly listeners = new Set<LinkListener>();

  protected keyOf(link: Link): string {
    return link.url;
  }

  protected fromDocument(document: LinksDocument): Link[] {
    return document.links.map(
      (record): Link => ({
        url: record.url,
        tokens: tokenizeUrl(record.url),
        status: record.status,
        filterMatchedId: record.filter_matched_id,
        deleted: record.deleted,
        limitReason: record.status === 'to_skip_limit' ? record.limit_reason : null,
        createdAt: new Date(record.created_at),
        updatedAt: new Date(record.updated_at),
        source: record.source,
        sourceFile: record.source_file,
        retryCount: record.retry_count,
        lastError: record.last_error,
      })
    );
  }

  protected toDocument(links: Link[]): LinksDocument {
    return {
      version: DOCUMENT_VERSION,
      links: links.map(
        (link): LinkRecord => ({
          url: link.url,
          status: link.status,
          filter_matched_id: link.filterMatchedId,
          deleted: link.deleted,
          limit_reason: link.limitReason,
          created_at: link.createdAt.toISOString(),
          updated_at: link.updatedAt.toISOString(),
          source: link.source,
          source_file: link.sourceFile,
          retry_count: link.retryCount,
          last_error: link.lastError,
        })
      ),
    };
  }

  async open(): Promise<void> {
    await super.open();
    logger.info(`Loaded ${this.count()} links from ${this.document.filePath}`);
  }

  get(url: string): Link | undefined {
    const link = this.entries.get(url);
    return link ? cloneLink(link) : undefined;
  }

  has(url: string): boolean {
    return this.entries.has(url);
  }

  /**
   * Lazy and restartable: each iteration walks the state current when it
   * starts and yields copies.
   */
  query(predicate: LinkPredicate = () => true): Iterable<Link> {
    const current = (): Map<string, Link> => this.entries;

    return {
      *[Symbol.iterator]() {
        for (const link of current().values()) {
          if (predicate(link)) {
            yield cloneLink(link);
          }
        }
      },
    };
  }

  byStatus(status: LinkStatus): Link[] {
    return [...this.query((link) => link.status === status)];
  }

  countByStatus(): Record<LinkStatus, number> {
    const counts: Record<LinkStatus, number> = {
      to_download: 0,
      to_skip: 0,
      deleted: 0,
      to_reprocess: 0,
      to_skip_limit: 0,
      downloaded: 0,
      failed: 0,
    };
    for (const link of this.entries.values()) {
      counts[link.status]++;
    }
    return counts;
  }

  /**
   * Inserts an unseen URL or applies a classification to a known one.
   * `deleted` follows the status, so a non-deleting action reactivates a
   * previously deleted link.
   */
  async upsert(input: LinkUpsert): Promise<Link> {
    const link = await this.mutate((next, now) => {
      const existing = next.get(input.url);
      const link: Link = existing
        ? {
            ...existing,
            status: input.status,
            filterMatchedId: input.filterMatchedId,
            deleted: input.status === 'deleted',
            limitReason: null,
            updatedAt: now,
            retryCount: 0,
            lastError: null,
          }
        : {
            url: input.url,
            tokens: tokenizeUrl(input.url),
            status: input.status,
            filterMatchedId: input.filterMatchedId,
            deleted: input.status === 'deleted',
            limitReason: null,
            createdAt: now,
            updatedAt: now,
            source: input.source ?? 'manual',
            sourceFile: input.sourceFile ?? null,
            retryCount: 0,
            lastError: null,
          };

      if (existing?.deleted && !link.deleted) {
        logger.info(`Link reactivated: ${input.url}`);
      }

      next.set(link.url, link);
      return {
        changes: [{ url: link.url, previous: existing?.status ?? null, current: link.status, link }],
        value: link,
      };
    });

    return cloneLink(link);
  }

  /**
   * Pipeline transition. Leaves the deleted flag alone; the limit reason
   * survives only on `to_skip_limit`.
   */
  async updateStatus(url: string, status: LinkStatus, patch: LinkStatusPatch = {}): Promise<Link | null> {
    const link = await this.mutate<Link | null>((next, now) => {
      const existing = next.get(url);
      if (!existing) {
        return { changes: [], value: null };
      }

      const updated: Link = {
        ...existing,
        status,
        limitReason: status === 'to_skip_limit' ? (patch.limitReason ?? existing.limitReason) : null,
        retryCount: patch.retryCount ?? existing.retryCount,
        lastError: patch.lastError !== undefined ? patch.lastError : existing.lastError,
        updatedAt: now,
      };

      next.set(url, updated);
      return { changes: [{ url, previous: existing.status, current: status, link: updated }], value: updated };
    });

    return link ? cloneLink(link) : null;
  }

  /**
   * Flags every matching link `to_reprocess` in one commit. Returns the
   * affected URLs.
   */
  async markReprocess(predicate: LinkPredicate): Promise<string[]> {
    return this.mutate((next, now) => {
      const changed: LinkChange[] = [];
      for (const existing of next.values()) {
        if (!predicate(existing)) {
          continue;
        }
        const link: Link = { ...existing, status: 'to_reprocess', limitReason: null, updatedAt: now };
        next.set(link.url, link);
        changed.push({ url: link.url, previous: existing.status, current: link.status, link });
      }
      return { changes: changed, value: changed.map((change) => change.url) };
    });
  }

  /**
   * Operator override from the affected-links view. Unknown URLs are ignored;
   * returns the URLs that changed.
   */
  async setManualStatus(urls: readonly string[], status: ManualStatus): Promise<string[]> {
    return this.mutate((next, now) => {
      const changed: LinkChange[] = [];
      for (const url of new Set(urls)) {
        const existing = next.get(url);
        if (!existing) {
          continue;
        }

        const link: Link = {
          ...existing,
          status,
          deleted: status === 'to_reprocess' ? existing.deleted : status === 'deleted',
          limitReason: null,
          retryCount: status === 'to_download' ? 0 : existing.retryCount,
          updatedAt: now,
        };
        next.set(url, link);
        changed.push({ url, previous: existing.status, current: status, link });
      }
      return { changes: changed, value: changed.map((change) => change.url) };
    });
  }

  /**
   * Listeners run after each commit, outside the write lock.
   */
  subscribe(listener: LinkListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async mutate<T>(apply: (next: Map<string, Link>, now: Date) => Applied<T>): Promise<T> {
    const { changes, value } = await this.lock.run(async () => {
      const next = new Map(this.entries);
      const applied = apply(next, new Date());
      if (applied.changes.length > 0) {
        await this.commit(next);
      }
      return applied;
    });

    if (changes.length > 0) {
      this.lock.outside(() => this.notify(changes));
    }
    return value;
  }

  private notify(changes: LinkChange[]): void {
    for (const change of changes) {
      for (const listener of this.listeners) {
        try {
          listener({ ...change, link: cloneLink(change.link) });
        } catch (error) {
          logger.error(`Link listener failed for ${change.url}`, error);
        }
      }
    }
  }
}
