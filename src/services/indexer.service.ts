import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import type { ConversationState } from '../interfaces/conversation-state.interface';
import type { ResolvedEngineOptions } from '../interfaces/engine-module-options.interface';
import type {
  ISearchIndex,
  SearchDocument,
} from '../interfaces/search-index.interface';
import { toSearchDocument } from '../utils/to-search-document';
import { ENGINE_MODULE_OPTIONS, SEARCH_INDEX } from '../engine.constants';

export type IndexerOptions = Pick<
  ResolvedEngineOptions,
  'indexMaxAttempts' | 'indexRetryDelayMs'
>;

interface IndexJob {
  id: string;
  document: SearchDocument;
  attempts: number;
  sequence: number;
}

export interface DeadLetter {
  id: string;
  document: SearchDocument;
  attempts: number;
  lastError: string;
  failedAt: Date;
}

/**
 * Forwards completed turns to the search index off the turn's path. The
 * queue holds at most one document per thread (latest wins); failed
 * upserts retry with exponential backoff, then park as dead letters.
 */
@Injectable()
export class Indexer implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(Indexer.name);
  private readonly queue = new Map<string, IndexJob>();
  private readonly deadLetters = new Map<string, DeadLetter>();
  private readonly latestSequence = new Map<string, number>();
  private readonly retryTimers = new Set<NodeJS.Timeout>();
  private readonly idleWaiters: Array<() => void> = [];
  private draining: Promise<void> | null = null;
  private sequence = 0;

  constructor(
    @Optional()
    @Inject(SEARCH_INDEX)
    private readonly index: ISearchIndex | null,
    @Inject(ENGINE_MODULE_OPTIONS)
    private readonly options: IndexerOptions,
  ) {}

  get enabled(): boolean {
    return Boolean(this.index);
  }

  async onModuleInit(): Promise<void> {
    if (!this.index) {
      this.logger.warn('No search index configured: conversation search disabled');
      return;
    }
    try {
      await this.index.setup();
    } catch (error) {
      this.logger.warn(
        `Search index setup failed, documents will be retried: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  async onModuleDestroy(): Promise<void> {
    this.cancelRetries();
    await this.flush();
    if (!this.index) return;
    try {
      await this.index.close();
    } catch (error) {
      this.logger.error(
        'Error while closing search index',
        error instanceof Error ? error.stack : error,
      );
    }
  }

  /** Schedules the write and returns; never throws for index problems. */
  publish(state: ConversationState): void {
    if (!this.index) {
      return;
    }

    const sequence = ++this.sequence;
    this.latestSequence.set(state.threadId, sequence);
    this.enqueue({
      id: state.threadId,
      document: toSearchDocument(state),
      attempts: 0,
      sequence,
    });
  }

  /** Resolves once nothing is queued, draining or waiting to retry. */
  flush(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Moves every dead letter back onto the queue. */
  requeueDeadLetters(): number {
    const letters = Array.from(this.deadLetters.values());
    this.deadLetters.clear();

    for (const letter of letters) {
      const sequence = ++this.sequence;
      this.latestSequence.set(letter.id, sequence);
      this.enqueue({
        id: letter.id,
        document: letter.document,
        attempts: 0,
        sequence,
      });
    }
    return letters.length;
  }

  getDeadLetters(): DeadLetter[] {
    return Array.from(this.deadLetters.values());
  }

  get pendingCount(): number {
    return this.queue.size + this.retryTimers.size;
  }

  private enqueue(job: IndexJob): void {
    this.queue.delete(job.id);
    this.queue.set(job.id, job);
    this.deadLetters.delete(job.id);
    this.scheduleDrain();
  }

  private scheduleDrain(): void {
    if (this.draining) return;

    this.draining = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.drain())
      .catch((error) => {
        this.logger.error(
          'Unhandled error in index drain worker',
          error instanceof Error ? error.stack : error,
        );
      })
      .finally(() => {
        this.draining = null;
        if (this.queue.size > 0) {
          this.scheduleDrain();
        } else {
          this.notifyIfIdle();
        }
      });
  }

  private async drain(): Promise<void> {
    const index = this.index;
    if (!index) return;

    for (const job of this.queue.values()) {
      this.queue.delete(job.id);
      try {
        await index.upsert(job.id, job.document);
        this.settle(job);
        this.logger.debug(`Indexed conversation ${job.id}`);
      } catch (error) {
        this.handleFailure(job, error);
      }
    }
  }

  private handleFailure(job: IndexJob, error: unknown): void {
    if (this.latestSequence.get(job.id) !== job.sequence) {
      return;
    }

    const attempts = job.attempts + 1;
    const message = error instanceof Error ? error.message : String(error);

    if (attempts >= this.options.indexMaxAttempts) {
      this.deadLetters.set(job.id, {
        id: job.id,
        document: job.document,
        attempts,
        lastError: message,
        failedAt: new Date(),
      });
      this.settle(job);
      this.logger.warn(
        `Indexing ${job.id} failed after ${attempts} attempt(s), parked: ${message}`,
      );
      return;
    }

    const delay = this.options.indexRetryDelayMs * 2 ** (attempts - 1);
    this.logger.warn(
      `Indexing ${job.id} failed (attempt ${attempts}), retrying in ${delay}ms: ${message}`,
    );

    const timer = setTimeout(() => {
      this.retryTimers.delete(timer);
      const superseded =
        this.latestSequence.get(job.id) !== job.sequence ||
        this.queue.has(job.id);
      if (!superseded) {
        this.queue.set(job.id, { ...job, attempts });
        this.scheduleDrain();
      } else {
        this.notifyIfIdle();
      }
    }, delay);
    timer.unref();
    this.retryTimers.add(timer);
  }

  /** Forgets the thread's sequence unless a newer publish is in flight. */
  private settle(job: IndexJob): void {
    if (this.latestSequence.get(job.id) === job.sequence) {
      this.latestSequence.delete(job.id);
    }
  }

  private cancelRetries(): void {
    if (this.retryTimers.size === 0) return;
    this.logger.warn(
      `Dropping ${this.retryTimers.size} pending index retry(ies) on shutdown`,
    );
    for (const timer of this.retryTimers) {
      clearTimeout(timer);
    }
    this.retryTimers.clear();
  }

  private isIdle(): boolean {
    return (
      this.draining === null &&
      this.queue.size === 0 &&
      this.retryTimers.size === 0
    );
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
