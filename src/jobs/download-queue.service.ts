import type { Link, LinkChange, LinkStatus } from '../database/database.types.js';
import type { LinkRepository } from '../database/repositories/link.repository.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger/logger.service.js';
import type {
  DownloadExecutor,
  DownloadOutcome,
  LimitDecisionPrompt,
  LimitThresholds,
  ProgressListener,
  ProgressSample,
  ProgressSink,
  ProgressSnapshot,
  QueueState,
  QueueStats,
  SlotProgress,
  StopPolicy,
} from './download.types.js';
import { LimitMonitor, hasThresholds } from './limit-monitor.js';
import { type QueueTier, TwoTierQueue } from './link-queue.js';

export interface DownloadQueueOptions {
  slots: number;
  maxRetries: number;
  stopPolicy: StopPolicy;
  limits: LimitThresholds;
  limitSampleIntervalMs: number;
}

export interface OverrideResult {
  success: boolean;
  message: string;
}

interface ActiveDownload {
  url: string;
  /** Null for override downloads, which run outside the slots. */
  slot: number | null;
  controller: AbortController;
  monitor: LimitMonitor | null;
  progress: SlotProgress;
  skipRequested: boolean;
  stopRequested: boolean;
  limitReason: string | null;
}

function tierFor(link: Pick<Link, 'status' | 'deleted'>): QueueTier | null {
  if (link.deleted) {
    return null;
  }
  if (link.status === 'to_download') {
    return 'high';
  }
  if (link.status === 'to_skip') {
    return 'low';
  }
  return null;
}

/**
 * Two-tier download dispatcher. `to_download` links form the high tier and
 * `to_skip` links the low one; every dispatch decision drains the high tier
 * first, so high-tier work queued while a low-tier download runs is taken at
 * the next completion.
 */
export class DownloadQueueService {
  private state: QueueState = 'idle';
  private readonly queue = new TwoTierQueue();
  private readonly slots: Array<ActiveDownload | null>;
  private readonly overrides = new Map<string, ActiveDownload>();
  private readonly tasks = new Set<Promise<void>>();
  private readonly listeners = new Set<ProgressListener>();
  private idleWaiters: Array<() => void> = [];
  private unsubscribe: (() => void) | null = null;
  private readonly counters = { completed: 0, failed: 0, retried: 0, skipped: 0, limitSkipped: 0 };

  constructor(
    private readonly links: LinkRepository,
    private readonly executor: DownloadExecutor,
    private readonly prompt: LimitDecisionPrompt,
    private readonly options: DownloadQueueOptions
  ) {
    this.slots = Array.from({ length: Math.max(1, options.slots) }, () => null);
  }

  get currentState(): QueueState {
    return this.state;
  }

  /**
   * Loads both tiers from the store and starts dispatching. Store changes
   * feed the tiers from here on.
   */
  start(): void {
    if (this.state === 'running') {
      return;
    }

    this.queue.clear();
    for (const link of this.links.query((l) => tierFor(l) !== null)) {
      const tier = tierFor(link);
      if (tier && !this.isInFlight(link.url)) {
        this.queue.enqueue(link.url, tier);
      }
    }

    if (!this.unsubscribe) {
      this.unsubscribe = this.links.subscribe((change) => this.onLinkChange(change));
    }

    this.state = 'running';
    logger.info(
      `Download queue started: ${this.queue.highSize} to download, ${this.queue.lowSize} skipped, ${this.slots.length} slots`
    );
    this.dispatch();
  }

  /**
   * Stops starting new downloads; in-flight work continues.
   */
  pause(): boolean {
    if (this.state !== 'running') {
      return false;
    }
    this.state = 'paused';
    logger.info('Download queue paused');
    this.emitProgress();
    this.notifyIfIdle();
    return true;
  }

  resume(): boolean {
    if (this.state !== 'paused') {
      return false;
    }
    this.state = 'running';
    logger.info('Download queue resumed');
    this.dispatch();
    return true;
  }

  /**
   * Clears both tiers. In-flight downloads finish, or are aborted under the
   * `abort` policy, which also withdraws their pending limit decisions.
   * Link statuses in the store are left as they are.
   */
  stop(): void {
    if (this.state === 'idle' || this.state === 'stopped') {
      return;
    }

    this.state = 'stopped';
    this.queue.clear();

    if (this.options.stopPolicy === 'abort') {
      for (const active of this.activeDownloads()) {
        active.stopRequested = true;
        active.controller.abort();
      }
    }

    logger.info(`Download queue stopped (${this.options.stopPolicy})`);
    this.dispatch();
  }

  /**
   * Aborts the download in `slot`, or in every slot when omitted. The link
   * becomes `to_skip` and goes to the low tier. Returns the skipped URLs.
   */
  skipCurrent(slot?: number): string[] {
    const targets = slot === undefined ? this.slots : [this.slots[slot] ?? null];
    const skipped: string[] = [];

    for (const active of targets) {
      if (!active || active.skipRequested) {
        continue;
      }
      active.skipRequested = true;
      active.controller.abort();
      skipped.push(active.url);
      logger.info(`Skipping current download in slot ${active.slot}: ${active.url}`);
    }

    return skipped;
  }

  /**
   * Single dispatch decision point: fills every free slot, high tier first.
   */
  dispatch(): void {
    if (this.state === 'running') {
      for (let slot = 0; slot < this.slots.length; slot++) {
        if (this.slots[slot]) {
          continue;
        }

        const next = this.queue.takeNext((url, tier) => this.isDispatchable(url, tier));
        if (!next) {
          break;
        }
        this.launch(slot, next.url);
      }
    }

    this.emitProgress();
    this.notifyIfIdle();
  }

  /**
   * Downloads a `to_skip_limit` link right away, outside the tiers and slots
   * and with limits disabled.
   */
  retryDeferred(url: string): OverrideResult {
    const link = this.links.get(url);
    if (!link) {
      return { success: false, message: 'Link not found' };
    }
    if (link.status !== 'to_skip_limit') {
      return { success: false, message: `Link is ${link.status}, not deferred` };
    }
    if (this.isInFlight(url)) {
      return { success: false, message: 'Link is already downloading' };
    }

    const active = this.createActive(url, null);
    this.overrides.set(url, active);
    this.track(this.execute(active));

    logger.info(`Override download started: ${url}`);
    return { success: true, message: 'Override download started' };
  }

  getDeferredReview(): Link[] {
    return this.links.byStatus('to_skip_limit');
  }

  getQueued(): { high: string[]; low: string[] } {
    return this.queue.snapshot();
  }

  getProgress(): ProgressSnapshot {
    return {
      slots: this.slots.map((active) => (active ? this.progressOf(active) : null)),
      overrides: [...this.overrides.values()].map((active) => this.progressOf(active)),
      stats: this.getStats(),
    };
  }

  getStats(): QueueStats {
    return {
      state: this.state,
      queuedHigh: this.queue.highSize,
      queuedLow: this.queue.lowSize,
      inFlight: this.slots.filter((active) => active !== null).length,
      overrides: this.overrides.size,
      ...this.counters,
    };
  }

  onProgress(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves once nothing is in flight and nothing more will be dispatched.
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stops the queue, detaches from the store and waits for running tasks.
   */
  async close(): Promise<void> {
    this.stop();
    this.unsubscribe?.();
    this.unsubscribe = null;
    await Promise.all([...this.tasks]);
  }

  private onLinkChange(change: LinkChange): void {
    if (this.state !== 'running' && this.state !== 'paused') {
      return;
    }
    // Outcomes of our own downloads are queued by the completion handler
    if (this.isInFlight(change.url)) {
      return;
    }

    this.queue.remove(change.url);
    const tier = tierFor(change.link);
    if (tier) {
      this.queue.enqueue(change.url, tier);
    }
    this.dispatch();
  }

  private isDispatchable(url: string, tier: QueueTier): boolean {
    const link = this.links.get(url);
    return link !== undefined && tierFor(link) === tier && !this.isInFlight(url);
  }

  private isInFlight(url: string): boolean {
    return this.overrides.has(url) || this.slots.some((active) => active?.url === url);
  }

  private activeDownloads(): ActiveDownload[] {
    const inSlots = this.slots.filter((active): active is ActiveDownload => active !== null);
    return [...inSlots, ...this.overrides.values()];
  }

  private launch(slot: number, url: string): void {
    const active = this.createActive(url, slot);
    this.slots[slot] = active;
    this.track(this.execute(active));
    logger.info(`Download started in slot ${slot}: ${url}`);
  }

  private createActive(url: string, slot: number | null): ActiveDownload {
    const controller = new AbortController();
    const active: ActiveDownload = {
      url,
      slot,
      controller,
      monitor: null,
      progress: {
        slot,
        url,
        items: 0,
        total: null,
        bytes: 0,
        fraction: 0,
        awaitingDecision: false,
        startedAt: new Date(),
      },
      skipRequested: false,
      stopRequested: false,
      limitReason: null,
    };

    if (slot !== null && hasThresholds(this.options.limits)) {
      active.monitor = new LimitMonitor({
        url,
        slot,
        thresholds: this.options.limits,
        prompt: this.prompt,
        signal: controller.signal,
        onSkip: (reason) => {
          active.limitReason = reason;
          controller.abort();
        },
      });
      active.monitor.startClock(this.options.limitSampleIntervalMs);
    }

    return active;
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((error) => {
        logger.error('Download task failed:', error);
      })
      .then(() => {
        this.tasks.delete(tracked);
      });
    this.tasks.add(tracked);
  }

  private async execute(active: ActiveDownload): Promise<void> {
    let outcome: DownloadOutcome;
    try {
      outcome = await this.runExecutor(active);
      await this.awaitPendingDecision(active);
    } finally {
      active.monitor?.dispose();
      active.controller.abort();
    }

    await this.settle(active, outcome);
  }

  /**
   * A limit raised just before the executor returned still holds the slot
   * until the operator answers it. Skip-current and stop withdraw it.
   */
  private async awaitPendingDecision(active: ActiveDownload): Promise<void> {
    const decision = active.monitor?.decision;
    if (!decision) {
      return;
    }

    logger.info(`Download of ${active.url} returned while a limit decision is pending, waiting for it`);
    try {
      await decision;
    } catch (error) {
      logger.error(`Limit decision failed for ${active.url}:`, error);
    }
  }

  private runExecutor(active: ActiveDownload): Promise<DownloadOutcome> {
    const { signal } = active.controller;

    const aborted = new Promise<DownloadOutcome>((resolve) => {
      if (signal.aborted) {
        resolve({ status: 'aborted' });
        return;
      }
      signal.addEventListener('abort', () => resolve({ status: 'aborted' }), { once: true });
    });

    let started: Promise<DownloadOutcome>;
    try {
      started = this.executor.download(active.url, { signal, progress: this.progressSink(active) });
    } catch (error) {
      started = Promise.reject(error);
    }

    const download = started.catch(
      (error): DownloadOutcome =>
        signal.aborted ? { status: 'aborted' } : { status: 'failed', error: errorMessage(error) }
    );

    return Promise.race([download, aborted]);
  }

  private progressSink(active: ActiveDownload): ProgressSink {
    return {
      report: async (sample: ProgressSample) => {
        this.updateProgress(active, sample);
        if (!active.monitor) {
          return;
        }

        const verdict = active.monitor.observe({
          items: active.progress.items,
          bytes: active.progress.bytes,
          elapsedMs: active.monitor.elapsedMs(),
        });
        if (active.monitor.awaitingDecision) {
          this.emitProgress();
        }
        await verdict;
      },
    };
  }

  private updateProgress(active: ActiveDownload, sample: ProgressSample): void {
    const progress = active.progress;
    progress.items = Math.max(progress.items, sample.items);
    if (sample.bytes !== undefined) {
      progress.bytes = Math.max(progress.bytes, sample.bytes);
    }

    if (sample.total !== undefined && sample.total !== null && sample.total > 0) {
      progress.total = Math.max(progress.total ?? 0, sample.total);
    }
    if (progress.total) {
      progress.fraction = Math.max(progress.fraction, Math.min(1, progress.items / progress.total));
    }

    this.emitProgress();
  }

  private async settle(active: ActiveDownload, outcome: DownloadOutcome): Promise<void> {
    let requeue: QueueTier | null = null;

    try {
      requeue = await this.recordOutcome(active, outcome);
    } catch (error) {
      logger.error(`Failed to record download outcome for ${active.url}:`, error);
    } finally {
      if (active.slot === null) {
        this.overrides.delete(active.url);
      } else {
        this.slots[active.slot] = null;
      }
    }

    if (requeue && (this.state === 'running' || this.state === 'paused')) {
      this.queue.enqueue(active.url, requeue);
    }
    this.dispatch();
  }

  private async recordOutcome(active: ActiveDownload, outcome: DownloadOutcome): Promise<QueueTier | null> {
    const { url } = active;

    if (active.limitReason !== null) {
      await this.links.updateStatus(url, 'to_skip_limit', { limitReason: active.limitReason });
      this.counters.limitSkipped++;
      logger.info(`Download deferred: ${url} (${active.limitReason})`);
      return null;
    }

    if (active.skipRequested) {
      await this.links.updateStatus(url, 'to_skip');
      this.counters.skipped++;
      return 'low';
    }

    if (active.stopRequested) {
      logger.info(`Download abandoned on stop: ${url}`);
      return null;
    }

    if (outcome.status === 'completed') {
      await this.links.updateStatus(url, 'downloaded', { lastError: null });
      this.counters.completed++;
      logger.info(`Download completed: ${url}`);
      return null;
    }

    const error = outcome.status === 'failed' ? outcome.error : 'Download aborted';
    return this.recordFailure(active, error);
  }

  private async recordFailure(active: ActiveDownload, error: string): Promise<QueueTier | null> {
    const { url } = active;

    if (active.slot === null) {
      await this.links.updateStatus(url, 'failed', { lastError: error });
      this.counters.failed++;
      logger.warn(`Override download failed: ${url}: ${error}`);
      return null;
    }

    const retryCount = (this.links.get(url)?.retryCount ?? 0) + 1;
    const status: LinkStatus = retryCount <= this.options.maxRetries ? 'to_download' : 'failed';
    await this.links.updateStatus(url, status, { retryCount, lastError: error });

    if (status === 'failed') {
      this.counters.failed++;
      logger.warn(`Download failed after ${retryCount} attempts: ${url}: ${error}`);
      return null;
    }

    this.counters.retried++;
    logger.warn(`Download failed, retry ${retryCount} of ${this.options.maxRetries}: ${url}: ${error}`);
    return 'high';
  }

  private progressOf(active: ActiveDownload): SlotProgress {
    return {
      ...active.progress,
      startedAt: new Date(active.progress.startedAt),
      awaitingDecision: active.monitor?.awaitingDecision ?? false,
    };
  }

  private emitProgress(): void {
    if (this.listeners.size === 0) {
      return;
    }

    const snapshot = this.getProgress();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        logger.error('Progress listener failed:', error);
      }
    }
  }

  private isIdle(): boolean {
    if (this.activeDownloads().length > 0) {
      return false;
    }
    return this.state !== 'running' || this.queue.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) {
      return;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
