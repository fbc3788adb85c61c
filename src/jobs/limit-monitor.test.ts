import { afterEach, describe, expect, it, type Mock, vi } from 'vitest';
import type { LimitThresholds } from './download.types.js';
import { LimitMonitor, limitReason } from './limit-monitor.js';
import { ChannelLimitPrompt } from './limit-prompt.js';

vi.mock('../utils/logger/logger.service.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const URL = 'http://example.com/gallery';

describe('limitReason', () => {
  it('should format item counts as plain numbers', () => {
    expect(limitReason('item_count', 3, 2)).toBe('item_count: 3 > 2');
  });

  it('should format elapsed time in seconds', () => {
    expect(limitReason('elapsed_time', 61000, 60000)).toBe('elapsed_time: 61.0s > 60.0s');
  });

  it('should format file sizes in megabytes', () => {
    expect(limitReason('file_size', 3 * 1024 * 1024 + 512 * 1024, 500 * 1024 * 1024)).toBe(
      'file_size: 3.5MB > 500.0MB'
    );
  });
});

describe('LimitMonitor', () => {
  let prompt: ChannelLimitPrompt;
  let controller: AbortController;
  let onSkip: Mock<[string], void>;
  let clock: number;

  function createMonitor(thresholds: LimitThresholds): LimitMonitor {
    prompt = new ChannelLimitPrompt();
    controller = new AbortController();
    onSkip = vi.fn<[string], void>();
    clock = 0;
    return new LimitMonitor({
      url: URL,
      slot: 0,
      thresholds,
      prompt,
      signal: controller.signal,
      onSkip,
      now: () => clock,
    });
  }

  function pendingId(): string {
    const [pending] = prompt.channel.pending();
    if (!pending) {
      throw new Error('No pending decision');
    }
    return pending.id;
  }

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should proceed while under every threshold', async () => {
    const monitor = createMonitor({ maxItems: 5 });

    await expect(monitor.observe({ items: 5, bytes: 0, elapsedMs: 0 })).resolves.toEqual({ action: 'proceed' });
    expect(prompt.channel.pending()).toHaveLength(0);
  });

  it('should proceed without thresholds', async () => {
    const monitor = createMonitor({});

    await expect(monitor.observe({ items: 1000, bytes: 0, elapsedMs: 1e9 })).resolves.toEqual({ action: 'proceed' });
    expect(prompt.channel.pending()).toHaveLength(0);
  });

  it('should share one pending decision between samples and skip on request', async () => {
    const monitor = createMonitor({ maxItems: 2 });

    const first = monitor.observe({ items: 3, bytes: 0, elapsedMs: 0 });
    const second = monitor.observe({ items: 4, bytes: 0, elapsedMs: 0 });

    expect(monitor.awaitingDecision).toBe(true);
    expect(prompt.channel.pending()).toHaveLength(1);
    expect(prompt.channel.pending()[0]?.payload).toEqual({
      url: URL,
      slot: 0,
      kind: 'item_count',
      value: 3,
      limit: 2,
      reason: 'item_count: 3 > 2',
    });

    expect(prompt.channel.respond(pendingId(), 'skip')).toBe(true);

    const skip = { action: 'skip', reason: 'item_count: 3 > 2' };
    await expect(first).resolves.toEqual(skip);
    await expect(second).resolves.toEqual(skip);
    expect(onSkip).toHaveBeenCalledTimes(1);
    expect(onSkip).toHaveBeenCalledWith('item_count: 3 > 2');
    expect(monitor.skipReason).toBe('item_count: 3 > 2');
    expect(monitor.awaitingDecision).toBe(false);

    await expect(monitor.observe({ items: 5, bytes: 0, elapsedMs: 0 })).resolves.toEqual(skip);
    expect(prompt.channel.pending()).toHaveLength(0);
  });

  it('should raise a decision when saved bytes pass the size threshold', async () => {
    const monitor = createMonitor({ maxItems: 100, maxBytes: 1024 * 1024 });

    await expect(monitor.observe({ items: 1, bytes: 1024 * 1024, elapsedMs: 0 })).resolves.toEqual({
      action: 'proceed',
    });
    expect(monitor.decision).toBeNull();

    const verdict = monitor.observe({ items: 2, bytes: 2 * 1024 * 1024, elapsedMs: 0 });
    expect(monitor.decision).not.toBeNull();
    expect(prompt.channel.pending()[0]?.payload).toMatchObject({
      kind: 'file_size',
      value: 2 * 1024 * 1024,
      limit: 1024 * 1024,
      reason: 'file_size: 2.0MB > 1.0MB',
    });

    prompt.channel.respond(pendingId(), 'skip');
    await expect(verdict).resolves.toEqual({ action: 'skip', reason: 'file_size: 2.0MB > 1.0MB' });
    expect(monitor.decision).toBeNull();
  });

  it('should stop checking after the operator continues', async () => {
    const monitor = createMonitor({ maxItems: 2 });

    const verdict = monitor.observe({ items: 3, bytes: 0, elapsedMs: 0 });
    prompt.channel.respond(pendingId(), 'continue');

    await expect(verdict).resolves.toEqual({ action: 'proceed' });
    await expect(monitor.observe({ items: 50, bytes: 0, elapsedMs: 0 })).resolves.toEqual({ action: 'proceed' });
    expect(prompt.channel.pending()).toHaveLength(0);
    expect(onSkip).not.toHaveBeenCalled();
  });

  it('should report a withdrawn decision when the download is aborted', async () => {
    const monitor = createMonitor({ maxItems: 2 });

    const verdict = monitor.observe({ items: 3, bytes: 0, elapsedMs: 0 });
    controller.abort();

    await expect(verdict).resolves.toEqual({ action: 'withdrawn' });
    expect(prompt.channel.pending()).toHaveLength(0);
    expect(monitor.skipReason).toBeNull();
    expect(onSkip).not.toHaveBeenCalled();
  });

  it('should sample elapsed time on the clock', async () => {
    vi.useFakeTimers();
    const monitor = createMonitor({ maxElapsedMs: 60000 });
    const skipped = new Promise<string>((resolve) => onSkip.mockImplementation(resolve));

    monitor.startClock(1000);
    expect(vi.getTimerCount()).toBe(1);

    clock = 30000;
    vi.advanceTimersByTime(1000);
    expect(prompt.channel.pending()).toHaveLength(0);

    clock = 61000;
    vi.advanceTimersByTime(1000);
    expect(prompt.channel.pending()[0]?.payload).toMatchObject({
      kind: 'elapsed_time',
      reason: 'elapsed_time: 61.0s > 60.0s',
    });

    prompt.channel.respond(pendingId(), 'skip');

    await expect(skipped).resolves.toBe('elapsed_time: 61.0s > 60.0s');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should not start a clock without an elapsed-time threshold', () => {
    vi.useFakeTimers();
    const monitor = createMonitor({ maxItems: 2 });

    monitor.startClock(1000);

    expect(vi.getTimerCount()).toBe(0);
  });
});
