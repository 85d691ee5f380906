import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { CronJob } from 'cron';
import { Indexer } from './indexer.service';
import type { ResolvedEngineOptions } from '../interfaces/engine-module-options.interface';
import { ENGINE_MODULE_OPTIONS } from '../engine.constants';

export const INDEX_RETRY_JOB_NAME = 'conversation-index-retry';

export type IndexRetryCronOptions = Pick<
  ResolvedEngineOptions,
  'indexRetryCronExpression' | 'enableIndexRetryCron'
>;

export interface IndexRetrySweepResult {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  requeued: number;
  stillParked: number;
}

@Injectable()
export class IndexRetryCronService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(IndexRetryCronService.name);

  constructor(
    private readonly indexer: Indexer,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(ENGINE_MODULE_OPTIONS)
    private readonly options: IndexRetryCronOptions,
  ) {}

  onModuleInit(): void {
    if (!this.options.enableIndexRetryCron) {
      this.logger.log('Index retry cron disabled by configuration');
      return;
    }
    if (!this.indexer.enabled) {
      this.logger.log('Index retry cron skipped: no search index configured');
      return;
    }

    const job = new CronJob(this.options.indexRetryCronExpression, () => {
      this.replayDeadLetters()
        .then((summary) => {
          if (summary.requeued === 0 && summary.stillParked === 0) return;
          this.logger.log(
            `Index retry summary: requeued=${summary.requeued}, stillParked=${summary.stillParked}, durationMs=${summary.durationMs}`,
          );
        })
        .catch((err) => {
          this.logger.error('Unhandled error in index retry cron', err);
        });
    });

    this.schedulerRegistry.addCronJob(INDEX_RETRY_JOB_NAME, job);
    job.start();
    this.logger.log(
      `Index retry cron registered with expression: ${this.options.indexRetryCronExpression}`,
    );
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('cron', INDEX_RETRY_JOB_NAME)) {
      this.schedulerRegistry.deleteCronJob(INDEX_RETRY_JOB_NAME);
    }
  }

  /** Requeues parked documents and waits for the queue to settle. */
  async replayDeadLetters(): Promise<IndexRetrySweepResult> {
    const startedAt = new Date();
    const requeued = this.indexer.requeueDeadLetters();
    if (requeued > 0) {
      await this.indexer.flush();
    }

    const finishedAt = new Date();
    return {
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      requeued,
      stillParked: this.indexer.getDeadLetters().length,
    };
  }
}
