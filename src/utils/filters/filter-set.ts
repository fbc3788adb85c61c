import {
  DOCUMENT_VERSION,
  type FilterRecord,
  type FiltersDocument,
  type filtersDocumentSchema,
} from '../../database/document.schemas.js';
import type { JsonDocument } from '../../database/json-document.js';
import { FilterValidationError } from '../errors.js';
import { logger } from '../logger/logger.service.js';
import { parseFilterDraft } from '../validators/filter.schemas.js';
import type { WriteLock } from '../write-lock.js';
import { rulesHold } from './rule-matcher.js';
import {
  placeholderName,
  type FilterDraft,
  type FilterMatch,
  type LinkFilter,
  type MoveDirection,
} from './filter.types.js';

function cloneFilter(filter: LinkFilter): LinkFilter {
  return { ...filter, rules: filter.rules.map((rule) => ({ ...rule })) };
}

function fromRecord(record: FilterRecord): LinkFilter {
  return {
    numericId: record.numeric_id,
    name: record.name,
    rules: record.rules.map((rule) => ({ ...rule })),
    action: record.action,
    priorityRank: record.priority_rank,
    enabled: record.enabled,
  };
}

function toRecord(filter: LinkFilter): FilterRecord {
  return {
    numeric_id: filter.numericId,
    name: filter.name,
    rules: filter.rules.map((rule) => ({ ...rule })),
    action: filter.action,
    priority_rank: filter.priorityRank,
    enabled: filter.enabled,
  };
}

function withRanks(filters: LinkFilter[]): LinkFilter[] {
  return filters.map((filter, index) => ({ ...filter, priorityRank: index }));
}

function validateDraft(input: unknown): FilterDraft {
  const result = parseFilterDraft(input);
  if (!result.success) {
    throw new FilterValidationError(result.errors);
  }
  return result.draft;
}

/**
 * Ordered filter collection. The front of the list has the highest priority
 * and evaluation stops at the first filter whose rules all hold.
 */
export class FilterSet {
  private filters: LinkFilter[] = [];
  private nextNumericId = 1;

  constructor(
    private readonly document: JsonDocument<typeof filtersDocumentSchema>,
    private readonly lock: WriteLock
  ) {}

  async open(): Promise<void> {
    const stored = await this.document.read();
    if (!stored) {
      this.filters = [];
      this.nextNumericId = 1;
      return;
    }

    const ordered = [...stored.filters].sort((a, b) => a.priority_rank - b.priority_rank);
    this.filters = withRanks(ordered.map(fromRecord));
    this.nextNumericId = stored.next_numeric_id;
    logger.info(`Loaded ${this.filters.length} filters from ${this.document.filePath}`);
  }

  get size(): number {
    return this.filters.length;
  }

  list(): LinkFilter[] {
    return this.filters.map(cloneFilter);
  }

  get(numericId: number): LinkFilter | undefined {
    const filter = this.filters.find((f) => f.numericId === numericId);
    return filter ? cloneFilter(filter) : undefined;
  }

  indexOf(numericId: number): number {
    return this.filters.findIndex((f) => f.numericId === numericId);
  }

  /**
   * Validates the draft and inserts it at `insertAt` (default: the end).
   * Throws FilterValidationError without touching the set when the draft is invalid.
   */
  async add(input: unknown, insertAt?: number): Promise<LinkFilter> {
    const draft = validateDraft(input);

    return this.lock.run(async () => {
      const numericId = this.nextNumericId;
      const name = draft.name && draft.name.length > 0 ? draft.name : placeholderName(numericId);
      const created: LinkFilter = {
        numericId,
        name,
        rules: draft.rules.map((rule) => ({ ...rule })),
        action: draft.action,
        priorityRank: 0,
        enabled: draft.enabled ?? true,
      };

      const index = Math.max(0, Math.min(insertAt ?? this.filters.length, this.filters.length));
      const next = [...this.filters];
      next.splice(index, 0, created);

      await this.commit(withRanks(next), numericId + 1);
      logger.info(`Filter ${numericId} "${name}" added at rank ${index}`);

      return this.get(numericId) ?? cloneFilter(created);
    });
  }

  /**
   * Replaces the content of an existing filter, keeping its id and rank.
   * Returns null when the id is unknown.
   */
  async update(numericId: number, input: unknown): Promise<LinkFilter | null> {
    const draft = validateDraft(input);

    return this.lock.run(async () => {
      const index = this.indexOf(numericId);
      const current = this.filters[index];
      if (!current) {
        return null;
      }

      const replaced: LinkFilter = {
        ...current,
        name: draft.name && draft.name.length > 0 ? draft.name : current.name,
        rules: draft.rules.map((rule) => ({ ...rule })),
        action: draft.action,
        enabled: draft.enabled ?? current.enabled,
      };

      const next = [...this.filters];
      next[index] = replaced;
      await this.commit(next, this.nextNumericId);
      logger.info(`Filter ${numericId} updated`);

      return cloneFilter(replaced);
    });
  }

  /**
   * Turns a filter on or off in place. Returns null when the id is unknown.
   */
  async setEnabled(numericId: number, enabled: boolean): Promise<LinkFilter | null> {
    return this.lock.run(async () => {
      const index = this.indexOf(numericId);
      const current = this.filters[index];
      if (!current) {
        return null;
      }
      if (current.enabled === enabled) {
        return cloneFilter(current);
      }

      const next = [...this.filters];
      next[index] = { ...current, enabled };
      await this.commit(next, this.nextNumericId);
      logger.info(`Filter ${numericId} ${enabled ? 'enabled' : 'disabled'}`);

      return cloneFilter(next[index] ?? current);
    });
  }

  /**
   * Removes a filter. Its id is never handed out again.
   */
  async remove(numericId: number): Promise<LinkFilter | null> {
    return this.lock.run(async () => {
      const removed = this.filters.find((f) => f.numericId === numericId);
      if (!removed) {
        return null;
      }

      await this.commit(
        withRanks(this.filters.filter((f) => f.numericId !== numericId)),
        this.nextNumericId
      );
      logger.info(`Filter ${numericId} removed`);

      return cloneFilter(removed);
    });
  }

  /**
   * Swaps a filter with its neighbour. Returns false when the id is unknown
   * or the filter is already at that end of the list.
   */
  async move(numericId: number, direction: MoveDirection): Promise<boolean> {
    return this.lock.run(async () => {
      const index = this.indexOf(numericId);
      if (index === -1) {
        return false;
      }

      const target = direction === 'up' ? index - 1 : index + 1;
      if (target < 0 || target >= this.filters.length) {
        return false;
      }

      return this.reorderLocked(index, target);
    });
  }

  /**
   * Moves a filter to `index`, clamped to the list bounds.
   */
  async reorder(numericId: number, index: number): Promise<boolean> {
    return this.lock.run(async () => {
      const from = this.indexOf(numericId);
      if (from === -1) {
        return false;
      }

      const to = Math.max(0, Math.min(index, this.filters.length - 1));
      if (to === from) {
        return false;
      }

      return this.reorderLocked(from, to);
    });
  }

  /**
   * First-match evaluation in priority order. Disabled filters are passed
   * over and not counted as evaluated.
   */
  match(tokens: readonly string[]): FilterMatch {
    let evaluated = 0;

    for (const filter of this.filters) {
      if (!filter.enabled) {
        continue;
      }
      evaluated++;
      if (this.matchesFilter(filter, tokens)) {
        return { filter: cloneFilter(filter), evaluated };
      }
    }

    return { filter: null, evaluated };
  }

  matchesFilter(filter: LinkFilter, tokens: readonly string[]): boolean {
    return filter.enabled && rulesHold(filter.rules, tokens);
  }

  private async reorderLocked(from: number, to: number): Promise<boolean> {
    const next = [...this.filters];
    const [moved] = next.splice(from, 1);
    if (!moved) {
      return false;
    }
    next.splice(to, 0, moved);

    await this.commit(withRanks(next), this.nextNumericId);
    logger.info(`Filter ${moved.numericId} moved from rank ${from} to ${to}`);
    return true;
  }

  private async commit(next: LinkFilter[], nextNumericId: number): Promise<void> {
    const document: FiltersDocument = {
      version: DOCUMENT_VERSION,
      next_numeric_id: nextNumericId,
      filters: next.map(toRecord),
    };

    await this.document.write(document);
    this.filters = next;
    this.nextNumericId = nextNumericId;
  }
}
