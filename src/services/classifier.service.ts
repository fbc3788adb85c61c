import type { Link, LinkSource } from '../database/database.types.js';
import type { LinkRepository } from '../database/repositories/link.repository.js';
import { FilterValidationError, RequestWithdrawnError } from '../utils/errors.js';
import type { FilterSet } from '../utils/filters/filter-set.js';
import type { FilterAction, LinkFilter } from '../utils/filters/filter.types.js';
import { logger } from '../utils/logger/logger.service.js';
import { normalizeUrl, tokenizeUrl } from '../utils/url-tokenizer.js';

export interface RuleAuthoringRequest {
  url: string;
  tokens: readonly string[];
  attempt: number;
  /** Validation messages for the previous attempt, empty on the first one. */
  errors: string[];
}

export type RuleAuthoringAnswer = { action: 'create'; draft: unknown } | { action: 'cancel' };

/**
 * Supplies a new filter when nothing in the set matches a link.
 */
export interface RuleAuthoring {
  requestNewFilter(request: RuleAuthoringRequest): Promise<RuleAuthoringAnswer>;
}

export interface ClassificationResult {
  matched: LinkFilter | null;
  action: FilterAction | null;
  evaluated: number;
}

export interface LinkOrigin {
  source: LinkSource;
  sourceFile?: string | null;
}

export type ProcessOutcome =
  | { kind: 'classified'; link: Link; filter: LinkFilter }
  | { kind: 'known'; link: Link }
  | { kind: 'ignored'; url: string }
  | { kind: 'cancelled'; url: string };

export interface ReprocessSummary {
  reclassified: string[];
  unmatched: string[];
  cancelled: boolean;
}

export interface ClassifierOptions {
  trimTrailingClosers: boolean;
}

export class ClassifierService {
  constructor(
    private readonly links: LinkRepository,
    private readonly filters: FilterSet,
    private readonly authoring: RuleAuthoring,
    private readonly options: ClassifierOptions = { trimTrailingClosers: false }
  ) {}

  /**
   * First-match classification against the current filter order.
   */
  classify(link: Pick<Link, 'tokens'>): ClassificationResult {
    const { filter, evaluated } = this.filters.match(link.tokens);
    return {
      matched: filter,
      action: filter ? filter.action : null,
      evaluated,
    };
  }

  /**
   * Classifies one raw URL and records the result. Known links that are
   * neither deleted nor awaiting reprocessing are left untouched. When no
   * filter matches, a new one is requested; on cancel the store is not
   * touched.
   */
  async processLink(rawUrl: string, origin: LinkOrigin): Promise<ProcessOutcome> {
    const url = normalizeUrl(rawUrl, { trimTrailingClosers: this.options.trimTrailingClosers });
    if (url.length === 0) {
      return { kind: 'ignored', url };
    }

    const existing = this.links.get(url);
    if (existing && !existing.deleted && existing.status !== 'to_reprocess') {
      logger.debug(`Link already known (${existing.status}): ${url}`);
      return { kind: 'known', link: existing };
    }

    const tokens = existing?.tokens ?? tokenizeUrl(url);
    const filter = await this.resolveFilter(url, tokens);
    if (!filter) {
      logger.info(`Classification cancelled for ${url}`);
      return { kind: 'cancelled', url };
    }

    const link = await this.links.upsert({
      url,
      status: filter.action,
      filterMatchedId: filter.numericId,
      source: origin.source,
      sourceFile: origin.sourceFile ?? null,
    });

    logger.debug(`Link ${url} classified ${filter.action} by filter ${filter.numericId}`);
    return { kind: 'classified', link, filter };
  }

  /**
   * Re-evaluates every `to_reprocess` link against the current order without
   * asking for new filters. Unmatched links keep `to_reprocess`.
   */
  async reprocessPending(): Promise<ReprocessSummary> {
    const summary: ReprocessSummary = { reclassified: [], unmatched: [], cancelled: false };

    for (const link of this.links.byStatus('to_reprocess')) {
      const { matched } = this.classify(link);
      if (!matched) {
        summary.unmatched.push(link.url);
        continue;
      }

      await this.links.upsert({ url: link.url, status: matched.action, filterMatchedId: matched.numericId });
      summary.reclassified.push(link.url);
    }

    if (summary.reclassified.length > 0 || summary.unmatched.length > 0) {
      logger.info(
        `Reprocessed ${summary.reclassified.length} links, ${summary.unmatched.length} still unmatched`
      );
    }
    return summary;
  }

  /**
   * Operator-requested re-evaluation of specific links, asking for new
   * filters where nothing matches. Stops at the first cancel; the links not
   * reached stay `to_reprocess`.
   */
  async reprocessLinks(urls: readonly string[]): Promise<ReprocessSummary> {
    const known = [...new Set(urls)].filter((url) => this.links.has(url));
    await this.links.markReprocess((link) => known.includes(link.url));

    const summary: ReprocessSummary = { reclassified: [], unmatched: [], cancelled: false };

    for (const url of known) {
      const link = this.links.get(url);
      if (!link || link.status !== 'to_reprocess') {
        continue;
      }

      const filter = await this.resolveFilter(url, link.tokens);
      if (!filter) {
        summary.cancelled = true;
        summary.unmatched.push(...known.slice(known.indexOf(url)));
        break;
      }

      await this.links.upsert({ url, status: filter.action, filterMatchedId: filter.numericId });
      summary.reclassified.push(url);
    }

    return summary;
  }

  /**
   * Returns the winning filter, asking the authoring collaborator for new
   * ones until a filter matches. Null means the request was cancelled.
   */
  private async resolveFilter(url: string, tokens: readonly string[]): Promise<LinkFilter | null> {
    let result = this.classify({ tokens });
    let errors: string[] = [];
    let attempt = 0;

    while (!result.matched) {
      attempt++;

      let answer: RuleAuthoringAnswer;
      try {
        answer = await this.authoring.requestNewFilter({ url, tokens, attempt, errors });
      } catch (error) {
        if (error instanceof RequestWithdrawnError) {
          return null;
        }
        throw error;
      }

      if (answer.action === 'cancel') {
        return null;
      }

      let created: LinkFilter;
      try {
        created = await this.filters.add(answer.draft);
      } catch (error) {
        if (error instanceof FilterValidationError) {
          logger.warn(`Rejected filter draft for ${url}: ${error.message}`);
          errors = error.errors;
          continue;
        }
        throw error;
      }

      result = this.classify({ tokens });
      errors = result.matched ? [] : [`Filter ${created.numericId} was added but does not match ${url}`];
    }

    return result.matched;
  }
}
