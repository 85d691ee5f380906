export type TurnRole = 'user' | 'assistant';

export interface TurnRecord {
  role: TurnRole;
  content: string;
  /** ISO-8601 timestamp */
  timestamp: string;
}

export type ReplySource = 'enriched' | 'fallback';

/**
 * Named business fields carried across turns. The engine never interprets
 * them; nodes own their meaning.
 */
export interface BusinessFields {
  intent?: string;
  orderReference?: string;
  pendingAction?: string;
  draftReply?: string;
  finalReply?: string;
  replySource?: ReplySource;
}

export type BusinessFieldName = keyof BusinessFields;

export const BUSINESS_FIELD_NAMES: readonly BusinessFieldName[] = [
  'intent',
  'orderReference',
  'pendingAction',
  'draftReply',
  'finalReply',
  'replySource',
];

export interface ConversationState {
  threadId: string;
  userId: string;
  sessionId: string;
  userMessage: string;
  fields: BusinessFields;
  awaitingExternalInput: boolean;
  resolved?: boolean;
  traceId: string;
  turns: TurnRecord[];
  createdAt: string;
  updatedAt: string;
}
