import { randomUUID } from 'node:crypto';
import { RequestWithdrawnError } from './errors.js';
import { logger } from './logger/logger.service.js';

export interface PendingDecision<TRequest> {
  id: string;
  payload: TRequest;
  createdAt: Date;
}

type RequestListener<TRequest> = (request: PendingDecision<TRequest>) => void;

interface Waiter<TResponse> {
  resolve: (value: TResponse) => void;
  reject: (reason: Error) => void;
}

/**
 * Request/response channel for human decision points inside asynchronous work.
 *
 * The requesting side awaits `request()`; the answering side (control API,
 * test harness) reads `pending()` or subscribes with `onRequest()` and posts
 * the answer with `respond()`.
 */
export class DecisionChannel<TRequest, TResponse> {
  private readonly entries = new Map<string, PendingDecision<TRequest>>();
  private readonly waiters = new Map<string, Waiter<TResponse>>();
  private readonly listeners = new Set<RequestListener<TRequest>>();

  constructor(private readonly name: string) {}

  request(payload: TRequest, signal?: AbortSignal): Promise<TResponse> {
    const entry: PendingDecision<TRequest> = {
      id: randomUUID(),
      payload,
      createdAt: new Date(),
    };

    if (signal?.aborted) {
      return Promise.reject(new RequestWithdrawnError(entry.id));
    }

    const answer = new Promise<TResponse>((resolve, reject) => {
      this.waiters.set(entry.id, { resolve, reject });
    });
    this.entries.set(entry.id, entry);

    signal?.addEventListener('abort', () => this.withdraw(entry.id), { once: true });

    logger.debug(`Decision requested on ${this.name}`, { id: entry.id });

    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (error) {
        logger.error(`Decision listener on ${this.name} failed`, error);
      }
    }

    return answer;
  }

  pending(): PendingDecision<TRequest>[] {
    return [...this.entries.values()];
  }

  get(id: string): PendingDecision<TRequest> | undefined {
    return this.entries.get(id);
  }

  /**
   * Answers a pending request. Returns false when the id is unknown or was
   * already answered.
   */
  respond(id: string, value: TResponse): boolean {
    const waiter = this.waiters.get(id);
    if (!waiter) {
      return false;
    }

    this.entries.delete(id);
    this.waiters.delete(id);
    waiter.resolve(value);

    logger.debug(`Decision answered on ${this.name}`, { id });
    return true;
  }

  withdraw(id: string): boolean {
    const waiter = this.waiters.get(id);
    if (!waiter) {
      return false;
    }

    this.entries.delete(id);
    this.waiters.delete(id);
    waiter.reject(new RequestWithdrawnError(id));
    return true;
  }

  onRequest(listener: RequestListener<TRequest>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
