export const ENGINE_MODULE_OPTIONS = Symbol('ENGINE_MODULE_OPTIONS');
export const ENGINE_MODULE_OPTIONS_INPUT = Symbol('ENGINE_MODULE_OPTIONS_INPUT');
export const STATE_STORE = Symbol('STATE_STORE');
export const SEARCH_INDEX = Symbol('SEARCH_INDEX');
export const DURABLE_GRAPH_METADATA = 'conversation-engine:durable-graph';

export const DEFAULT_MAX_STEPS = 25;
export const DEFAULT_INDEX_MAX_ATTEMPTS = 3;
export const DEFAULT_INDEX_RETRY_DELAY_MS = 500;
export const DEFAULT_INDEX_RETRY_CRON = '0 * * * * *';
export const DEFAULT_CHECKPOINT_TABLE = 'conversation_checkpoints';
export const DEFAULT_SEARCH_INDEX_NAME = 'agent_conversations';

export const THREAD_ID_SEPARATOR = ':';
export const CHECKPOINT_SCHEMA = 'conversation-checkpoint';
export const FAILED_TURN_REPLY =
  'I apologize, but I encountered an error. Please try again or contact support.';
