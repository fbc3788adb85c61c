import path from 'node:path';
import type { BatchStatus, IngestionBatch, LinkSource } from '../database/database.types.js';
import type { BatchRepository } from '../database/repositories/batch.repository.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger/logger.service.js';
import { extractUrls } from '../utils/url-extractor.js';
import type { ClassifierService, ProcessOutcome } from './classifier.service.js';
import type { InputReader } from './input-reader.js';

export const CLIPBOARD_PREFIX = 'Clipboard_';

export interface IngestionResult {
  path: string;
  status: BatchStatus | 'skipped';
  linksFound: number;
  /** URLs looked at during this run. */
  handled: number;
  classified: number;
  known: number;
  resumeIndex: number;
  error?: string;
}

export interface IngestFileOptions {
  /** Ingest again even when the file was fully processed before. */
  force?: boolean;
}

export interface IngestionServiceDeps {
  classifier: ClassifierService;
  batches: BatchRepository;
  reader: InputReader;
  linkFilesDir: string;
  now?: () => Date;
}

function sourceOf(filePath: string): LinkSource {
  return path.basename(filePath).startsWith(CLIPBOARD_PREFIX) ? 'clipboard' : 'file';
}

export class IngestionService {
  private readonly classifier: ClassifierService;
  private readonly batches: BatchRepository;
  private readonly reader: InputReader;
  private readonly linkFilesDir: string;
  private readonly now: () => Date;

  constructor(deps: IngestionServiceDeps) {
    this.classifier = deps.classifier;
    this.batches = deps.batches;
    this.reader = deps.reader;
    this.linkFilesDir = deps.linkFilesDir;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Saves the captured text verbatim as `Clipboard_<epoch seconds>.txt` and
   * ingests that file.
   */
  async ingestClipboard(text: string): Promise<IngestionResult> {
    const filePath = await this.captureFile();
    await this.reader.writeText(filePath, text);
    logger.info(`Saved clipboard content to: ${filePath}`);

    return this.ingestFile(filePath);
  }

  /**
   * Classifies the URLs of one file in order. A cancelled classification
   * halts the batch; the next run resumes at the URL that was cancelled.
   */
  async ingestFile(filePath: string, options: IngestFileOptions = {}): Promise<IngestionResult> {
    const previous = this.batches.get(filePath);
    if (previous?.status === 'processed' && !options.force) {
      logger.debug(`File ${filePath} already processed`);
      return {
        path: filePath,
        status: 'skipped',
        linksFound: previous.linksFound,
        handled: 0,
        classified: 0,
        known: 0,
        resumeIndex: previous.resumeIndex,
      };
    }

    let text: string;
    try {
      text = await this.reader.readText(filePath);
    } catch (error) {
      logger.error(`Error reading ${filePath}:`, error);
      return this.finish(filePath, { status: 'error', resumeIndex: 0, linksFound: 0, error: errorMessage(error) });
    }

    const urls = extractUrls(text);
    const startIndex =
      previous?.status === 'processed_halted' && !options.force ? Math.min(previous.resumeIndex, urls.length) : 0;
    const origin = { source: sourceOf(filePath), sourceFile: filePath };
    const counts = { handled: 0, classified: 0, known: 0 };

    if (startIndex > 0) {
      logger.info(`Resuming ${filePath} at link ${startIndex + 1} of ${urls.length}`);
    }

    for (let index = startIndex; index < urls.length; index++) {
      const url = urls[index];
      if (url === undefined) {
        break;
      }

      let outcome: ProcessOutcome;
      try {
        outcome = await this.classifier.processLink(url, origin);
      } catch (error) {
        logger.error(`Failed to process ${url} from ${filePath}:`, error);
        return this.finish(
          filePath,
          { status: 'error', resumeIndex: index, linksFound: urls.length, error: errorMessage(error) },
          counts
        );
      }

      if (outcome.kind === 'cancelled') {
        logger.info(`Ingestion of ${filePath} halted at link ${index + 1} of ${urls.length}`);
        return this.finish(filePath, { status: 'processed_halted', resumeIndex: index, linksFound: urls.length }, counts);
      }

      counts.handled++;
      if (outcome.kind === 'classified') counts.classified++;
      if (outcome.kind === 'known') counts.known++;
    }

    logger.info(`Processed ${filePath}: ${urls.length} links, ${counts.classified} classified`);
    return this.finish(filePath, { status: 'processed', resumeIndex: urls.length, linksFound: urls.length }, counts);
  }

  /**
   * Ingests the files of a directory in name order. Stops at the first
   * halted batch; the files after it are left for the next run.
   */
  async ingestDirectory(dir: string = this.linkFilesDir): Promise<IngestionResult[]> {
    const files = await this.reader.listFiles(dir);
    const results: IngestionResult[] = [];

    for (const file of files) {
      const result = await this.ingestFile(file);
      results.push(result);
      if (result.status === 'processed_halted') {
        break;
      }
    }

    logger.info(`Ingested ${results.length} of ${files.length} files from ${dir}`);
    return results;
  }

  haltedBatches(): IngestionBatch[] {
    return this.batches.list().filter((batch) => batch.status === 'processed_halted');
  }

  private async captureFile(): Promise<string> {
    const seconds = Math.floor(this.now().getTime() / 1000);
    let filePath = path.join(this.linkFilesDir, `${CLIPBOARD_PREFIX}${seconds}.txt`);

    for (let suffix = 1; await this.reader.exists(filePath); suffix++) {
      filePath = path.join(this.linkFilesDir, `${CLIPBOARD_PREFIX}${seconds}_${suffix}.txt`);
    }
    return filePath;
  }

  private async finish(
    filePath: string,
    state: Pick<IngestionBatch, 'status' | 'resumeIndex' | 'linksFound'> & { error?: string },
    counts: { handled: number; classified: number; known: number } = { handled: 0, classified: 0, known: 0 }
  ): Promise<IngestionResult> {
    const now = this.now();
    await this.batches.save({
      path: filePath,
      status: state.status,
      processedAt: now,
      haltedAt: state.status === 'processed_halted' ? now : null,
      resumeIndex: state.resumeIndex,
      linksFound: state.linksFound,
      error: state.error ?? null,
    });

    return {
      path: filePath,
      status: state.status,
      linksFound: state.linksFound,
      resumeIndex: state.resumeIndex,
      ...counts,
      ...(state.error ? { error: state.error } : {}),
    };
  }
}
