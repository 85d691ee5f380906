import type { ConversationState } from './conversation-state.interface';

export type TurnStatus = 'completed' | 'interrupted';

/** What GraphEngine.executeTurn returns for a turn that did not fail. */
export interface TurnExecution {
  status: TurnStatus;
  state: ConversationState;
  /** Resume point recorded in the final checkpoint */
  nextNode: string | null;
  visitedNodes: string[];
  checkpointVersion: number;
}

export type TurnFailureKind = 'node' | 'routing' | 'checkpoint' | 'internal';

export interface TurnFailure {
  kind: TurnFailureKind;
  message: string;
  node?: string;
}

interface TurnResultBase {
  state: ConversationState;
  sessionId: string;
  threadId: string;
  isNewThread: boolean;
}

export interface CompletedTurnResult extends TurnResultBase {
  status: 'completed';
  visitedNodes: string[];
}

export interface InterruptedTurnResult extends TurnResultBase {
  status: 'interrupted';
  visitedNodes: string[];
  interruptedAt: string;
}

export interface FailedTurnResult extends TurnResultBase {
  status: 'failed';
  error: TurnFailure;
}

export type TurnResult =
  | CompletedTurnResult
  | InterruptedTurnResult
  | FailedTurnResult;
