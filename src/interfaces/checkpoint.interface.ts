import type { ConversationState } from './conversation-state.interface';

export interface Checkpoint {
  threadId: string;
  namespace: string;
  /** Starts at 1, increases by exactly one per save */
  version: number;
  state: ConversationState;
  /** Node to enter on the next turn; null after a terminal edge */
  nextNode: string | null;
  savedAt: Date;
}

export interface CheckpointPayloadV1 {
  schema: 'conversation-checkpoint';
  version: 1;
  state: ConversationState;
  nextNode: string | null;
}
