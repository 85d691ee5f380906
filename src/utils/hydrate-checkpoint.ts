import { InvalidCheckpointError } from '../errors/invalid-checkpoint.error';
import { CHECKPOINT_SCHEMA } from '../engine.constants';
import type {
  Checkpoint,
  CheckpointPayloadV1,
} from '../interfaces/checkpoint.interface';
import {
  BUSINESS_FIELD_NAMES,
  type BusinessFields,
  type ConversationState,
  type TurnRecord,
} from '../interfaces/conversation-state.interface';
import type { StoredCheckpoint } from '../interfaces/state-store.interface';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepClone<T>(value: T): T {
  const copy: T = JSON.parse(JSON.stringify(value));
  return copy;
}

export function dehydrateCheckpoint(
  state: ConversationState,
  nextNode: string | null,
): CheckpointPayloadV1 {
  return {
    schema: CHECKPOINT_SCHEMA,
    version: 1,
    state: deepClone(state),
    nextNode,
  };
}

function readTurns(threadId: string, value: unknown): TurnRecord[] {
  if (!Array.isArray(value)) {
    throw new InvalidCheckpointError(
      threadId,
      `Checkpoint for thread ${threadId} has no turn list`,
    );
  }

  return value.map((entry: unknown, index): TurnRecord => {
    const malformed = new InvalidCheckpointError(
      threadId,
      `Checkpoint for thread ${threadId} has a malformed turn at index ${index}`,
    );
    if (!isPlainObject(entry)) throw malformed;

    const { role, content, timestamp } = entry;
    if (
      (role !== 'user' && role !== 'assistant') ||
      typeof content !== 'string' ||
      typeof timestamp !== 'string'
    ) {
      throw malformed;
    }
    return { role, content, timestamp };
  });
}

function readFields(threadId: string, value: unknown): BusinessFields {
  if (!isPlainObject(value)) {
    throw new InvalidCheckpointError(
      threadId,
      `Checkpoint for thread ${threadId} has invalid business fields`,
    );
  }

  const fields: BusinessFields = {};
  for (const name of BUSINESS_FIELD_NAMES) {
    const field = value[name];
    if (field === undefined || field === null) continue;
    if (typeof field !== 'string') {
      throw new InvalidCheckpointError(
        threadId,
        `Checkpoint for thread ${threadId} has non-string field ${name}`,
      );
    }
    if (name === 'replySource') {
      if (field !== 'enriched' && field !== 'fallback') {
        throw new InvalidCheckpointError(
          threadId,
          `Checkpoint for thread ${threadId} has invalid replySource ${field}`,
        );
      }
      fields.replySource = field;
    } else {
      fields[name] = field;
    }
  }
  return fields;
}

function readString(
  threadId: string,
  source: Record<string, unknown>,
  key: string,
): string {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new InvalidCheckpointError(
      threadId,
      `Checkpoint for thread ${threadId} has invalid ${key}`,
    );
  }
  return value;
}

function readState(threadId: string, value: unknown): ConversationState {
  if (!isPlainObject(value)) {
    throw new InvalidCheckpointError(
      threadId,
      `Checkpoint for thread ${threadId} has invalid state payload`,
    );
  }

  const storedThreadId = readString(threadId, value, 'threadId');
  if (storedThreadId !== threadId) {
    throw new InvalidCheckpointError(
      threadId,
      `Checkpoint for thread ${threadId} belongs to thread ${storedThreadId}`,
    );
  }

  const { awaitingExternalInput, resolved } = value;
  if (typeof awaitingExternalInput !== 'boolean') {
    throw new InvalidCheckpointError(
      threadId,
      `Checkpoint for thread ${threadId} has invalid awaitingExternalInput`,
    );
  }
  if (resolved !== undefined && typeof resolved !== 'boolean') {
    throw new InvalidCheckpointError(
      threadId,
      `Checkpoint for thread ${threadId} has invalid resolved flag`,
    );
  }

  const state: ConversationState = {
    threadId: storedThreadId,
    userId: readString(threadId, value, 'userId'),
    sessionId: readString(threadId, value, 'sessionId'),
    userMessage: readString(threadId, value, 'userMessage'),
    fields: readFields(threadId, value.fields),
    awaitingExternalInput,
    traceId: readString(threadId, value, 'traceId'),
    turns: readTurns(threadId, value.turns),
    createdAt: readString(threadId, value, 'createdAt'),
    updatedAt: readString(threadId, value, 'updatedAt'),
  };
  if (typeof resolved === 'boolean') {
    state.resolved = resolved;
  }
  return state;
}

/** Validates a stored record and turns it back into a Checkpoint. */
export function hydrateCheckpoint(stored: StoredCheckpoint): Checkpoint {
  const { threadId, payload } = stored;
  if (payload.schema !== CHECKPOINT_SCHEMA || payload.version !== 1) {
    throw new InvalidCheckpointError(
      threadId,
      `Checkpoint for thread ${threadId} is not a supported V1 conversation checkpoint`,
    );
  }

  const nextNode = payload.nextNode;
  if (nextNode !== null && typeof nextNode !== 'string') {
    throw new InvalidCheckpointError(
      threadId,
      `Checkpoint for thread ${threadId} has invalid next node ${String(nextNode)}`,
    );
  }

  return {
    threadId,
    namespace: stored.namespace,
    version: stored.version,
    state: readState(threadId, payload.state),
    nextNode,
    savedAt: new Date(stored.updatedAt),
  };
}
