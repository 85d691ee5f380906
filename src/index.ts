// Module
export {
  ConversationEngineModule,
  resolveEngineOptions,
} from './conversation-engine.module';

// Services
export { ConversationService } from './services/conversation.service';
export {
  ConversationSearchService,
  DEFAULT_SEARCH_LIMIT,
} from './services/conversation-search.service';
export { CheckpointManager } from './services/checkpoint-manager.service';
export { GraphRegistry } from './services/graph-registry.service';
export type { RegisteredGraph } from './services/graph-registry.service';
export { SessionRouter } from './services/session-router.service';
export type { ResolvedThread } from './services/session-router.service';
export { InterruptController } from './services/interrupt-controller.service';
export { Indexer } from './services/indexer.service';
export type { DeadLetter, IndexerOptions } from './services/indexer.service';
export {
  IndexRetryCronService,
  INDEX_RETRY_JOB_NAME,
} from './services/index-retry-cron.service';
export type {
  IndexRetryCronOptions,
  IndexRetrySweepResult,
} from './services/index-retry-cron.service';
export { GraphEngine } from './engines/graph.engine';
export type { TurnInput } from './engines/graph.engine';

// Decorators
export { DurableGraph } from './decorators/durable-graph.decorator';
export type {
  DurableGraphOptions,
  DurableGraphMetadata,
} from './decorators/durable-graph.decorator';

// Interfaces
export { END } from './interfaces/graph-definition.interface';
export type {
  CompiledEdge,
  ConditionalEdge,
  EdgeSpec,
  GraphDefinition,
  GraphProvider,
  GraphSpec,
  NodeContext,
  NodeFunction,
  NodePatch,
  RouterFunction,
} from './interfaces/graph-definition.interface';
export { BUSINESS_FIELD_NAMES } from './interfaces/conversation-state.interface';
export type {
  BusinessFieldName,
  BusinessFields,
  ConversationState,
  ReplySource,
  TurnRecord,
  TurnRole,
} from './interfaces/conversation-state.interface';
export type {
  Checkpoint,
  CheckpointPayloadV1,
} from './interfaces/checkpoint.interface';
export type {
  IStateStore,
  StateStoreWrite,
  StoredCheckpoint,
} from './interfaces/state-store.interface';
export type {
  ConversationStatistics,
  ISearchIndex,
  IntentCount,
  SearchDocument,
  SearchFilters,
} from './interfaces/search-index.interface';
export type {
  CompletedTurnResult,
  FailedTurnResult,
  InterruptedTurnResult,
  TurnExecution,
  TurnFailure,
  TurnFailureKind,
  TurnResult,
} from './interfaces/turn-result.interface';
export type {
  ConversationEngineModuleAsyncOptions,
  ConversationEngineModuleOptions,
  ResolvedEngineOptions,
} from './interfaces/engine-module-options.interface';

// Adapters
export { InMemoryStateStore } from './adapters/in-memory-state-store.adapter';
export { PgStateStore } from './adapters/pg-state-store.adapter';
export type { PgStateStoreOptions } from './adapters/pg-state-store.adapter';
export { InMemorySearchIndex } from './adapters/in-memory-search-index.adapter';
export {
  ElasticsearchSearchIndex,
  CONVERSATION_INDEX_MAPPINGS,
} from './adapters/elasticsearch-search-index.adapter';

// Utils
export { compileGraph } from './utils/compile-graph';
export { checkpointTableDdl } from './utils/checkpoint-table-ddl';
export { toSearchDocument } from './utils/to-search-document';
export { KeyedMutex } from './utils/keyed-mutex';

// Errors
export { GraphConfigurationError } from './errors/graph-configuration.error';
export { GraphRoutingError } from './errors/graph-routing.error';
export { GraphNotRegisteredError } from './errors/graph-not-registered.error';
export { DuplicateGraphError } from './errors/duplicate-graph.error';
export { NodeExecutionError } from './errors/node-execution.error';
export { StepLimitExceededError } from './errors/step-limit-exceeded.error';
export { CheckpointWriteError } from './errors/checkpoint-write.error';
export { CheckpointConflictError } from './errors/checkpoint-conflict.error';
export { InvalidCheckpointError } from './errors/invalid-checkpoint.error';
export { InvalidIdentifierError } from './errors/invalid-identifier.error';

// Events
export { EngineEventType } from './events/engine-event-type.enum';
export type {
  CheckpointSavedEvent,
  TurnCompletedEvent,
  TurnFailedEvent,
  TurnInterruptedEvent,
} from './events/engine-events';

// CLI
export { generateMigration } from './cli/generate-migration';

// Constants
export {
  ENGINE_MODULE_OPTIONS,
  STATE_STORE,
  SEARCH_INDEX,
  DURABLE_GRAPH_METADATA,
  DEFAULT_MAX_STEPS,
  DEFAULT_INDEX_MAX_ATTEMPTS,
  DEFAULT_INDEX_RETRY_DELAY_MS,
  DEFAULT_INDEX_RETRY_CRON,
  DEFAULT_CHECKPOINT_TABLE,
  DEFAULT_SEARCH_INDEX_NAME,
  FAILED_TURN_REPLY,
} from './engine.constants';
