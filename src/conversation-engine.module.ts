import { DynamicModule, Module, Provider } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { CheckpointManager } from './services/checkpoint-manager.service';
import { ConversationService } from './services/conversation.service';
import { ConversationSearchService } from './services/conversation-search.service';
import { GraphRegistry } from './services/graph-registry.service';
import { IndexRetryCronService } from './services/index-retry-cron.service';
import { Indexer } from './services/indexer.service';
import { InterruptController } from './services/interrupt-controller.service';
import { SessionRouter } from './services/session-router.service';
import { GraphEngine } from './engines/graph.engine';
import type {
  ConversationEngineModuleAsyncOptions,
  ConversationEngineModuleOptions,
  ResolvedEngineOptions,
} from './interfaces/engine-module-options.interface';
import {
  ENGINE_MODULE_OPTIONS,
  ENGINE_MODULE_OPTIONS_INPUT,
  STATE_STORE,
  SEARCH_INDEX,
  DEFAULT_MAX_STEPS,
  DEFAULT_INDEX_MAX_ATTEMPTS,
  DEFAULT_INDEX_RETRY_DELAY_MS,
  DEFAULT_INDEX_RETRY_CRON,
} from './engine.constants';

export function resolveEngineOptions(
  options: ConversationEngineModuleOptions,
): ResolvedEngineOptions {
  return {
    defaultGraphId: options.defaultGraphId,
    graphs: options.graphs ?? [],
    maxSteps: options.maxSteps ?? DEFAULT_MAX_STEPS,
    indexMaxAttempts: options.indexMaxAttempts ?? DEFAULT_INDEX_MAX_ATTEMPTS,
    indexRetryDelayMs: options.indexRetryDelayMs ?? DEFAULT_INDEX_RETRY_DELAY_MS,
    indexRetryCronExpression:
      options.indexRetryCronExpression ?? DEFAULT_INDEX_RETRY_CRON,
    enableIndexRetryCron: options.enableIndexRetryCron ?? true,
  };
}

const ENGINE_PROVIDERS: Provider[] = [
  CheckpointManager,
  InterruptController,
  SessionRouter,
  GraphEngine,
  GraphRegistry,
  Indexer,
  IndexRetryCronService,
  ConversationService,
  ConversationSearchService,
];

const ENGINE_EXPORTS = [
  ConversationService,
  ConversationSearchService,
  GraphRegistry,
  CheckpointManager,
  SessionRouter,
  Indexer,
  STATE_STORE,
  SEARCH_INDEX,
];

@Module({})
export class ConversationEngineModule {
  static forRoot(options: ConversationEngineModuleOptions): DynamicModule {
    return {
      module: ConversationEngineModule,
      imports: [
        DiscoveryModule,
        ScheduleModule.forRoot(),
        EventEmitterModule.forRoot(),
      ],
      providers: [
        {
          provide: STATE_STORE,
          useValue: options.store,
        },
        {
          provide: SEARCH_INDEX,
          useValue: options.searchIndex ?? null,
        },
        {
          provide: ENGINE_MODULE_OPTIONS,
          useValue: resolveEngineOptions(options),
        },
        ...ENGINE_PROVIDERS,
      ],
      exports: ENGINE_EXPORTS,
      global: true,
    };
  }

  static forRootAsync(
    options: ConversationEngineModuleAsyncOptions,
  ): DynamicModule {
    return {
      module: ConversationEngineModule,
      imports: [
        DiscoveryModule,
        ScheduleModule.forRoot(),
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers: [
        // The factory runs once; every derived provider reads its result.
        {
          provide: ENGINE_MODULE_OPTIONS_INPUT,
          useFactory: options.useFactory,
          inject: options.inject ?? [],
        },
        {
          provide: STATE_STORE,
          useFactory: (opts: ConversationEngineModuleOptions) => opts.store,
          inject: [ENGINE_MODULE_OPTIONS_INPUT],
        },
        {
          provide: SEARCH_INDEX,
          useFactory: (opts: ConversationEngineModuleOptions) =>
            opts.searchIndex ?? null,
          inject: [ENGINE_MODULE_OPTIONS_INPUT],
        },
        {
          provide: ENGINE_MODULE_OPTIONS,
          useFactory: (opts: ConversationEngineModuleOptions) =>
            resolveEngineOptions(opts),
          inject: [ENGINE_MODULE_OPTIONS_INPUT],
        },
        ...ENGINE_PROVIDERS,
      ],
      exports: ENGINE_EXPORTS,
      global: true,
    };
  }
}
