import { spawn } from 'node:child_process';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createInterface } from 'node:readline';
import { logger } from '../../utils/logger/logger.service.js';
import type { DownloadExecutor, DownloadOutcome, DownloadRequest } from '../download.types.js';

export interface CommandExecutorOptions {
  command: string;
  args: string[];
  cwd?: string;
}

const STDERR_TAIL = 2000;

/**
 * The saved file an output line names: an absolute or relative path, or a
 * path prefixed with `# ` for files already on disk. Null for other output.
 */
export function itemPath(line: string): string | null {
  const trimmed = line.trim().replace(/^# /, '');
  return /^(\/|\.{1,2}\/|[A-Za-z]:[\\/]|\\\\)/.test(trimmed) ? trimmed : null;
}

export function isItemLine(line: string): boolean {
  return itemPath(line) !== null;
}

/**
 * Runs an external download command with the URL as its last argument.
 * Each saved file counts as one item and its size is added to the byte
 * count; aborting kills the child.
 */
export class CommandDownloadExecutor implements DownloadExecutor {
  constructor(private readonly options: CommandExecutorOptions) {}

  async download(url: string, { signal, progress }: DownloadRequest): Promise<DownloadOutcome> {
    if (signal.aborted) {
      return { status: 'aborted' };
    }

    const child = spawn(this.options.command, [...this.options.args, url], {
      cwd: this.options.cwd,
      signal,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const exit = new Promise<{ code: number | null; error?: Error }>((resolve) => {
      child.once('error', (error) => resolve({ code: null, error }));
      child.once('close', (code) => resolve({ code }));
    });

    let stderr = '';
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_TAIL);
    });

    let items = 0;
    let bytes = 0;
    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
    for await (const line of lines) {
      const saved = itemPath(line);
      if (saved === null) {
        continue;
      }
      items++;
      bytes += await this.sizeOf(saved);
      await progress.report({ items, bytes });
    }

    const { code, error } = await exit;
    if (signal.aborted) {
      return { status: 'aborted' };
    }
    if (error) {
      return { status: 'failed', error: error.message };
    }
    if (code === 0) {
      logger.debug(`${this.options.command} saved ${items} items for ${url}`);
      return { status: 'completed', items };
    }

    const detail = stderr.trim().split('\n').pop() ?? '';
    return {
      status: 'failed',
      error: `${this.options.command} exited with code ${code}${detail ? `: ${detail}` : ''}`,
    };
  }

  async sizeOf(file: string): Promise<number> {
    try {
      const stats = await fs.stat(path.resolve(this.options.cwd ?? process.cwd(), file));
      return stats.size;
    } catch (error) {
      logger.debug(`Could not stat ${file}:`, error);
      return 0;
    }
  }
}
