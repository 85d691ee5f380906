import { DiscoveryService, Reflector } from '@nestjs/core';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { InMemoryStateStore } from '../src/adapters/in-memory-state-store.adapter';
import { GraphEngine } from '../src/engines/graph.engine';
import { CheckpointManager } from '../src/services/checkpoint-manager.service';
import { ConversationService } from '../src/services/conversation.service';
import { GraphRegistry } from '../src/services/graph-registry.service';
import { Indexer } from '../src/services/indexer.service';
import { InterruptController } from '../src/services/interrupt-controller.service';
import { SessionRouter } from '../src/services/session-router.service';
import { CustomerServiceGraph } from '../src/customer-service/customer-service.graph';
import {
  PassthroughReplyPolisher,
  type ReplyPolisher,
} from '../src/customer-service/reply-polisher';
import type { ConversationState } from '../src/interfaces/conversation-state.interface';
import type { GraphSpec } from '../src/interfaces/graph-definition.interface';
import type { ISearchIndex } from '../src/interfaces/search-index.interface';
import type { IStateStore } from '../src/interfaces/state-store.interface';
import { resolveEngineOptions } from '../src/conversation-engine.module';

export function createState(
  overrides: Partial<ConversationState> = {},
): ConversationState {
  return {
    threadId: 'user-1:session-1',
    userId: 'user-1',
    sessionId: 'session-1',
    userMessage: 'hello',
    fields: {},
    awaitingExternalInput: false,
    traceId: 'abcd1234',
    turns: [
      { role: 'user', content: 'hello', timestamp: '2024-01-01T00:00:00.000Z' },
    ],
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function createMockRegistry(graphs: GraphSpec[] = []): GraphRegistry {
  const mockDiscovery = {
    getProviders: () => [],
  } as unknown as DiscoveryService;
  const mockReflector = { get: () => undefined } as unknown as Reflector;
  return new GraphRegistry(mockDiscovery, mockReflector, { graphs });
}

export function createMockStore(): jest.Mocked<IStateStore> {
  return {
    durable: true,
    setup: jest.fn().mockResolvedValue(undefined),
    get: jest.fn().mockResolvedValue(null),
    put: jest.fn().mockResolvedValue(undefined),
    close: jest.fn().mockResolvedValue(undefined),
  };
}

export function createMockSearchIndex(): jest.Mocked<ISearchIndex> {
  return {
    setup: jest.fn().mockResolvedValue(undefined),
    upsert: jest.fn().mockResolvedValue(undefined),
    search: jest.fn().mockResolvedValue([]),
    aggregate: jest
      .fn()
      .mockResolvedValue({ totalCount: 0, resolvedCount: 0, intentCounts: [] }),
    close: jest.fn().mockResolvedValue(undefined),
  };
}

export function customerServiceSpec(
  polisher: ReplyPolisher = new PassthroughReplyPolisher(),
): GraphSpec {
  return new CustomerServiceGraph(polisher).define();
}

export interface EngineHarness {
  store: IStateStore;
  searchIndex: ISearchIndex | null;
  emitter: EventEmitter2;
  checkpoints: CheckpointManager;
  router: SessionRouter;
  registry: GraphRegistry;
  engine: GraphEngine;
  indexer: Indexer;
  service: ConversationService;
}

export interface EngineHarnessOptions {
  store?: IStateStore;
  searchIndex?: ISearchIndex | null;
  graphs?: GraphSpec[];
  maxSteps?: number;
  indexMaxAttempts?: number;
  indexRetryDelayMs?: number;
}

/** Wires the engine services by hand, the way the module would. */
export function createEngineHarness(
  options: EngineHarnessOptions = {},
): EngineHarness {
  const store = options.store ?? new InMemoryStateStore();
  const searchIndex = options.searchIndex ?? null;
  const resolved = resolveEngineOptions({
    store,
    searchIndex,
    graphs: options.graphs ?? [customerServiceSpec()],
    maxSteps: options.maxSteps,
    indexMaxAttempts: options.indexMaxAttempts,
    indexRetryDelayMs: options.indexRetryDelayMs ?? 1,
  });

  const emitter = new EventEmitter2();
  const checkpoints = new CheckpointManager(store, emitter);
  const router = new SessionRouter(checkpoints);
  const registry = createMockRegistry(resolved.graphs);
  registry.onModuleInit();
  const engine = new GraphEngine(
    checkpoints,
    new InterruptController(),
    resolved,
  );
  const indexer = new Indexer(searchIndex, resolved);
  const service = new ConversationService(
    registry,
    router,
    engine,
    indexer,
    emitter,
    resolved,
  );

  return {
    store,
    searchIndex,
    emitter,
    checkpoints,
    router,
    registry,
    engine,
    indexer,
    service,
  };
}
