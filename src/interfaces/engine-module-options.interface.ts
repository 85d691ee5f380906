import type {
  FactoryProvider,
  ModuleMetadata,
} from '@nestjs/common';
import type { IStateStore } from './state-store.interface';
import type { ISearchIndex } from './search-index.interface';
import type { GraphSpec } from './graph-definition.interface';

export interface ConversationEngineModuleOptions {
  /** Primary checkpoint store */
  store: IStateStore;
  /** Secondary search index. Omit or pass null to run without search. */
  searchIndex?: ISearchIndex | null;

  /** Graph used by runTurn when the caller names none */
  defaultGraphId?: string;
  /** Graphs registered in addition to @DurableGraph providers */
  graphs?: GraphSpec[];

  /** Node executions allowed per turn. Default: 25 */
  maxSteps?: number;

  /** Upsert attempts before a document is parked. Default: 3 */
  indexMaxAttempts?: number;
  /** Base backoff between attempts, doubled per retry. Default: 500 */
  indexRetryDelayMs?: number;
  /** Cron expression for dead-letter replay. Default: every minute */
  indexRetryCronExpression?: string;
  /** Register the dead-letter replay cron. Default: true */
  enableIndexRetryCron?: boolean;
}

export interface ResolvedEngineOptions {
  defaultGraphId?: string;
  graphs: GraphSpec[];
  maxSteps: number;
  indexMaxAttempts: number;
  indexRetryDelayMs: number;
  indexRetryCronExpression: string;
  enableIndexRetryCron: boolean;
}

export interface ConversationEngineModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory: (
    ...args: any[]
  ) =>
    | Promise<ConversationEngineModuleOptions>
    | ConversationEngineModuleOptions;
  inject?: FactoryProvider['inject'];
}
