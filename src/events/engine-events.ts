import type { TurnFailure } from '../interfaces/turn-result.interface';

export interface CheckpointSavedEvent {
  namespace: string;
  threadId: string;
  version: number;
  nextNode: string | null;
  timestamp: Date;
}

export interface TurnCompletedEvent {
  graphId: string;
  threadId: string;
  sessionId: string;
  isNewThread: boolean;
  visitedNodes: string[];
  resolved: boolean;
  timestamp: Date;
}

export interface TurnInterruptedEvent {
  graphId: string;
  threadId: string;
  sessionId: string;
  isNewThread: boolean;
  interruptedAt: string;
  timestamp: Date;
}

export interface TurnFailedEvent {
  graphId: string;
  threadId: string;
  sessionId: string;
  failure: TurnFailure;
  timestamp: Date;
}
