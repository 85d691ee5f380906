import type { TurnRecord } from './conversation-state.interface';

export interface SearchDocument {
  threadId: string;
  sessionId: string;
  userId: string;
  intent: string | null;
  orderReference: string | null;
  resolved: boolean;
  awaitingExternalInput: boolean;
  /** All turn contents joined, the full-text field */
  messages: string;
  turns: TurnRecord[];
  traceId: string;
  updatedAt: string;
}

export interface SearchFilters {
  userId?: string;
  intent?: string;
  resolved?: boolean;
}

export interface IntentCount {
  intent: string;
  count: number;
}

export interface ConversationStatistics {
  totalCount: number;
  resolvedCount: number;
  intentCounts: IntentCount[];
}

export interface ISearchIndex {
  setup(): Promise<void>;
  upsert(id: string, document: SearchDocument): Promise<void>;
  /** Newest first by updatedAt. */
  search(
    query: string,
    filters: SearchFilters,
    limit: number,
  ): Promise<SearchDocument[]>;
  aggregate(userId: string): Promise<ConversationStatistics>;
  close(): Promise<void>;
}
