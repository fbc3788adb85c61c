export const LINK_STATUSES = [
  'to_download',
  'to_skip',
  'deleted',
  'to_reprocess',
  'to_skip_limit',
  'downloaded',
  'failed',
] as const;

export type LinkStatus = (typeof LINK_STATUSES)[number];

export const LINK_SOURCES = ['file', 'clipboard', 'manual'] as const;

export type LinkSource = (typeof LINK_SOURCES)[number];

/**
 * Statuses an operator may set directly from the affected-links view.
 */
export const MANUAL_STATUSES = ['to_download', 'to_skip', 'to_reprocess', 'deleted'] as const;

export type ManualStatus = (typeof MANUAL_STATUSES)[number];

export interface Link {
  url: string;
  /** Derived from the url when the record is loaded or created; never persisted. */
  readonly tokens: readonly string[];
  status: LinkStatus;
  filterMatchedId: number | null;
  deleted: boolean;
  limitReason: string | null;
  createdAt: Date;
  updatedAt: Date;
  source: LinkSource;
  sourceFile: string | null;
  retryCount: number;
  lastError: string | null;
}

export interface LinkUpsert {
  url: string;
  status: LinkStatus;
  filterMatchedId: number | null;
  source?: LinkSource;
  sourceFile?: string | null;
}

export interface LinkStatusPatch {
  limitReason?: string | null;
  retryCount?: number;
  lastError?: string | null;
}

export interface LinkChange {
  url: string;
  previous: LinkStatus | null;
  current: LinkStatus;
  link: Link;
}

export type LinkPredicate = (link: Link) => boolean;

export const BATCH_STATUSES = ['processed', 'processed_halted', 'error'] as const;

export type BatchStatus = (typeof BATCH_STATUSES)[number];

export interface IngestionBatch {
  path: string;
  status: BatchStatus;
  processedAt: Date | null;
  haltedAt: Date | null;
  resumeIndex: number;
  linksFound: number;
  error: string | null;
}
