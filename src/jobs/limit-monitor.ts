import { RequestWithdrawnError } from '../utils/errors.js';
import { logger } from '../utils/logger/logger.service.js';
import type { LimitDecision, LimitDecisionPrompt, LimitKind, LimitThresholds } from './download.types.js';

export interface LimitSample {
  items: number;
  bytes: number;
  elapsedMs: number;
}

export type LimitVerdict = { action: 'proceed' } | { action: 'skip'; reason: string } | { action: 'withdrawn' };

export interface LimitMonitorOptions {
  url: string;
  slot: number | null;
  thresholds: LimitThresholds;
  prompt: LimitDecisionPrompt;
  /** Aborting withdraws a pending decision request. */
  signal: AbortSignal;
  /** Called once when the operator chooses to skip. */
  onSkip: (reason: string) => void;
  now?: () => number;
}

interface Exceeded {
  kind: LimitKind;
  value: number;
  limit: number;
}

const BYTES_PER_MB = 1024 * 1024;

function formatValue(kind: LimitKind, value: number): string {
  switch (kind) {
    case 'elapsed_time':
      return `${(value / 1000).toFixed(1)}s`;
    case 'file_size':
      return `${(value / BYTES_PER_MB).toFixed(1)}MB`;
    default:
      return String(value);
  }
}

export function hasThresholds(thresholds: LimitThresholds): boolean {
  return (
    thresholds.maxItems !== undefined || thresholds.maxBytes !== undefined || thresholds.maxElapsedMs !== undefined
  );
}

export function limitReason(kind: LimitKind, value: number, limit: number): string {
  return `${kind}: ${formatValue(kind, value)} > ${formatValue(kind, limit)}`;
}

const PROCEED: LimitVerdict = { action: 'proceed' };

/**
 * Watches one in-flight download against the configured thresholds. The first
 * exceeded threshold raises a decision request and every sample waits on it;
 * `continue` disarms the monitor for the rest of the download.
 */
export class LimitMonitor {
  private armed: boolean;
  private pending: Promise<LimitVerdict> | null = null;
  private skipped: string | null = null;
  private clock: NodeJS.Timeout | null = null;
  private lastItems = 0;
  private lastBytes = 0;
  private readonly startedAt: number;
  private readonly now: () => number;

  constructor(private readonly options: LimitMonitorOptions) {
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
    this.armed = hasThresholds(options.thresholds);
  }

  get awaitingDecision(): boolean {
    return this.pending !== null;
  }

  /**
   * The verdict of the decision currently waiting on the operator, if any.
   */
  get decision(): Promise<LimitVerdict> | null {
    return this.pending;
  }

  get skipReason(): string | null {
    return this.skipped;
  }

  elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  /**
   * Samples elapsed time on an interval, with the last reported counts.
   * Does nothing without an elapsed-time threshold.
   */
  startClock(intervalMs: number): void {
    if (this.options.thresholds.maxElapsedMs === undefined || this.clock) {
      return;
    }

    this.clock = setInterval(() => {
      this.observe({ items: this.lastItems, bytes: this.lastBytes, elapsedMs: this.elapsedMs() }).catch((error) => {
        logger.error(`Limit check failed for ${this.options.url}:`, error);
      });
    }, intervalMs);
  }

  dispose(): void {
    if (this.clock) {
      clearInterval(this.clock);
      this.clock = null;
    }
  }

  async observe(sample: LimitSample): Promise<LimitVerdict> {
    this.lastItems = Math.max(this.lastItems, sample.items);
    this.lastBytes = Math.max(this.lastBytes, sample.bytes);

    if (this.skipped !== null) {
      return { action: 'skip', reason: this.skipped };
    }
    if (this.pending) {
      return this.pending;
    }
    if (!this.armed) {
      return PROCEED;
    }

    const exceeded = this.firstExceeded(sample);
    if (!exceeded) {
      return PROCEED;
    }

    this.pending = this.decide(exceeded);
    try {
      return await this.pending;
    } finally {
      this.pending = null;
    }
  }

  private firstExceeded(sample: LimitSample): Exceeded | null {
    const { maxItems, maxBytes, maxElapsedMs } = this.options.thresholds;

    if (maxItems !== undefined && sample.items > maxItems) {
      return { kind: 'item_count', value: sample.items, limit: maxItems };
    }
    if (maxBytes !== undefined && sample.bytes > maxBytes) {
      return { kind: 'file_size', value: sample.bytes, limit: maxBytes };
    }
    if (maxElapsedMs !== undefined && sample.elapsedMs > maxElapsedMs) {
      return { kind: 'elapsed_time', value: sample.elapsedMs, limit: maxElapsedMs };
    }
    return null;
  }

  private async decide(exceeded: Exceeded): Promise<LimitVerdict> {
    const reason = limitReason(exceeded.kind, exceeded.value, exceeded.limit);
    logger.info(`Limit exceeded for ${this.options.url} (${reason}), waiting for a decision`);

    let decision: LimitDecision;
    try {
      decision = await this.options.prompt.ask(
        exceeded.kind,
        { url: this.options.url, slot: this.options.slot, reason, ...exceeded },
        this.options.signal
      );
    } catch (error) {
      if (error instanceof RequestWithdrawnError) {
        this.armed = false;
        this.dispose();
        return { action: 'withdrawn' };
      }
      throw error;
    }

    if (decision === 'continue') {
      this.armed = false;
      this.dispose();
      logger.info(`Limits lifted for ${this.options.url}`);
      return PROCEED;
    }

    this.skipped = reason;
    this.dispose();
    this.options.onSkip(reason);
    return { action: 'skip', reason };
  }
}
