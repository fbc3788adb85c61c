import type { Link, ManualStatus } from '../database/database.types.js';
import type { LinkRepository } from '../database/repositories/link.repository.js';
import { FilterValidationError, errorMessage } from '../utils/errors.js';
import type { FilterSet, LinkFilter, MoveDirection } from '../utils/filters/index.js';
import { logger } from '../utils/logger/logger.service.js';
import type { WriteLock } from '../utils/write-lock.js';
import type { ClassifierService, ReprocessSummary } from './classifier.service.js';

export interface FilterManagementResult {
  success: boolean;
  filter?: LinkFilter;
  message: string;
  errors?: string[];
}

export interface FilterListResult {
  success: boolean;
  filters: LinkFilter[];
  message?: string;
}

export interface FilterDeleteResult extends FilterManagementResult {
  reprocessed: string[];
}

export interface FilterOrderResult extends FilterManagementResult {
  reprocess?: ReprocessSummary;
}

export interface LinkStatusResult {
  success: boolean;
  message: string;
  urls: string[];
}

export interface FilterServiceDeps {
  filters: FilterSet;
  links: LinkRepository;
  lock: WriteLock;
  classifier: ClassifierService;
}

function stateName(enabled: boolean): string {
  return enabled ? 'enabled' : 'disabled';
}

/**
 * Filter management surface. Every operation reports through a result
 * object instead of throwing.
 */
export class FilterService {
  private readonly filters: FilterSet;
  private readonly links: LinkRepository;
  private readonly lock: WriteLock;
  private readonly classifier: ClassifierService;

  constructor(deps: FilterServiceDeps) {
    this.filters = deps.filters;
    this.links = deps.links;
    this.lock = deps.lock;
    this.classifier = deps.classifier;
  }

  /**
   * Add a new filter, at the end unless a rank is given
   */
  async createFilter(input: unknown, insertAt?: number): Promise<FilterManagementResult> {
    try {
      const filter = await this.filters.add(input, insertAt);

      return {
        success: true,
        filter,
        message: `Filter "${filter.name}" created`,
      };
    } catch (error) {
      return this.failure('create', error);
    }
  }

  /**
   * Replace the rules, action and name of an existing filter
   */
  async updateFilter(numericId: number, input: unknown): Promise<FilterManagementResult> {
    try {
      const filter = await this.filters.update(numericId, input);
      if (!filter) {
        return { success: false, message: 'Filter not found' };
      }

      return {
        success: true,
        filter,
        message: `Filter "${filter.name}" updated`,
      };
    } catch (error) {
      return this.failure('update', error);
    }
  }

  /**
   * Remove a filter and flag every link it classified for reprocessing,
   * in one step under the write lock
   */
  async deleteFilter(numericId: number): Promise<FilterDeleteResult> {
    try {
      return await this.lock.run(async () => {
        const removed = await this.filters.remove(numericId);
        if (!removed) {
          return { success: false, message: 'Filter not found', reprocessed: [] };
        }

        const reprocessed = await this.links.markReprocess((link) => link.filterMatchedId === numericId);
        logger.info(`Filter ${numericId} deleted, ${reprocessed.length} links flagged for reprocessing`);

        return {
          success: true,
          filter: removed,
          message: `Filter "${removed.name}" deleted`,
          reprocessed,
        };
      });
    } catch (error) {
      return { ...this.failure('delete', error), reprocessed: [] };
    }
  }

  async moveFilter(numericId: number, direction: MoveDirection): Promise<FilterOrderResult> {
    return this.changeOrder(numericId, () => this.filters.move(numericId, direction));
  }

  async reorderFilter(numericId: number, index: number): Promise<FilterOrderResult> {
    return this.changeOrder(numericId, () => this.filters.reorder(numericId, index));
  }

  /**
   * Turn a filter on or off; links waiting for reprocessing are classified
   * again against the new set
   */
  async setFilterEnabled(numericId: number, enabled: boolean): Promise<FilterOrderResult> {
    try {
      const current = this.filters.get(numericId);
      if (!current) {
        return { success: false, message: 'Filter not found' };
      }
      if (current.enabled === enabled) {
        return {
          success: true,
          filter: current,
          message: `Filter "${current.name}" is already ${stateName(enabled)}`,
        };
      }

      const filter = await this.filters.setEnabled(numericId, enabled);
      if (!filter) {
        return { success: false, message: 'Filter not found' };
      }

      const reprocess = await this.classifier.reprocessPending();
      return {
        success: true,
        filter,
        message: `Filter "${filter.name}" ${stateName(enabled)}`,
        reprocess,
      };
    } catch (error) {
      return this.failure(enabled ? 'enable' : 'disable', error);
    }
  }

  listFilters(): FilterListResult {
    return {
      success: true,
      filters: this.filters.list(),
    };
  }

  /**
   * Links whose current status came from this filter
   */
  affectedLinks(numericId: number): Link[] {
    return [...this.links.query((link) => link.filterMatchedId === numericId)];
  }

  /**
   * Explicit re-evaluation of a filter's links, with prompting for new filters
   */
  async reprocessAffected(numericId: number): Promise<ReprocessSummary> {
    const urls = this.affectedLinks(numericId).map((link) => link.url);
    return this.classifier.reprocessLinks(urls);
  }

  async setLinkStatus(urls: readonly string[], status: ManualStatus): Promise<LinkStatusResult> {
    try {
      const changed = await this.links.setManualStatus(urls, status);
      return {
        success: true,
        message: `${changed.length} links set to ${status}`,
        urls: changed,
      };
    } catch (error) {
      logger.error('Failed to set link status:', error);
      return { success: false, message: errorMessage(error), urls: [] };
    }
  }

  private async changeOrder(numericId: number, reorder: () => Promise<boolean>): Promise<FilterOrderResult> {
    try {
      if (!this.filters.get(numericId)) {
        return { success: false, message: 'Filter not found' };
      }

      const moved = await reorder();
      if (!moved) {
        return { success: false, message: 'Filter is already at that position' };
      }

      const reprocess = await this.classifier.reprocessPending();
      return {
        success: true,
        filter: this.filters.get(numericId),
        message: `Filter moved to rank ${this.filters.indexOf(numericId)}`,
        reprocess,
      };
    } catch (error) {
      return this.failure('reorder', error);
    }
  }

  private failure(operation: string, error: unknown): FilterManagementResult {
    if (error instanceof FilterValidationError) {
      return {
        success: false,
        message: error.message,
        errors: error.errors,
      };
    }

    logger.error(`Failed to ${operation} filter:`, error);
    return {
      success: false,
      message: `Failed to ${operation} filter: ${errorMessage(error)}`,
    };
  }
}
