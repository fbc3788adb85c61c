export interface ProgressSample {
  /** Items saved so far. */
  items: number;
  /** Expected item count when the executor knows it. */
  total?: number | null;
  /** Bytes saved so far. */
  bytes?: number;
}

/**
 * Executors await `report`: while a limit decision is pending it does not
 * resolve, which holds the download in place.
 */
export interface ProgressSink {
  report(sample: ProgressSample): Promise<void>;
}

export interface DownloadRequest {
  signal: AbortSignal;
  progress: ProgressSink;
}

export type DownloadOutcome =
  | { status: 'completed'; items?: number }
  | { status: 'failed'; error: string }
  | { status: 'aborted' };

export interface DownloadExecutor {
  download(url: string, request: DownloadRequest): Promise<DownloadOutcome>;
}

export type LimitKind = 'item_count' | 'file_size' | 'elapsed_time';

export type LimitDecision = 'continue' | 'skip';

export interface LimitContext {
  url: string;
  /** Null for override downloads. */
  slot: number | null;
  kind: LimitKind;
  value: number;
  limit: number;
  reason: string;
}

export interface LimitDecisionPrompt {
  ask(kind: LimitKind, context: LimitContext, signal?: AbortSignal): Promise<LimitDecision>;
}

export interface LimitThresholds {
  maxItems?: number;
  maxBytes?: number;
  maxElapsedMs?: number;
}

export type StopPolicy = 'finish' | 'abort';

export type QueueState = 'idle' | 'running' | 'paused' | 'stopped';

export interface SlotProgress {
  slot: number | null;
  url: string;
  items: number;
  total: number | null;
  bytes: number;
  fraction: number;
  awaitingDecision: boolean;
  startedAt: Date;
}

export interface QueueStats {
  state: QueueState;
  queuedHigh: number;
  queuedLow: number;
  inFlight: number;
  overrides: number;
  completed: number;
  failed: number;
  retried: number;
  skipped: number;
  limitSkipped: number;
}

export interface ProgressSnapshot {
  slots: Array<SlotProgress | null>;
  overrides: SlotProgress[];
  stats: QueueStats;
}

export type ProgressListener = (snapshot: ProgressSnapshot) => void;
