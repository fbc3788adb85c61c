export { DownloadQueueService, type DownloadQueueOptions, type OverrideResult } from './download-queue.service.js';
export type {
  DownloadExecutor,
  DownloadOutcome,
  DownloadRequest,
  LimitContext,
  LimitDecision,
  LimitDecisionPrompt,
  LimitKind,
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
export {
  CommandDownloadExecutor,
  isItemLine,
  itemPath,
  type CommandExecutorOptions,
} from './executors/command-download.executor.js';
export { LimitMonitor, hasThresholds, limitReason, type LimitSample, type LimitVerdict } from './limit-monitor.js';
export { ChannelLimitPrompt } from './limit-prompt.js';
export { TwoTierQueue, type QueueTier } from './link-queue.js';
