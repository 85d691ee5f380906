import type { ConversationState } from '../interfaces/conversation-state.interface';
import type { SearchDocument } from '../interfaces/search-index.interface';

export function toSearchDocument(state: ConversationState): SearchDocument {
  return {
    threadId: state.threadId,
    sessionId: state.sessionId,
    userId: state.userId,
    intent: state.fields.intent ?? null,
    orderReference: state.fields.orderReference ?? null,
    resolved: state.resolved ?? false,
    awaitingExternalInput: state.awaitingExternalInput,
    messages: state.turns.map((turn) => turn.content).join(' '),
    turns: state.turns.map((turn) => ({ ...turn })),
    traceId: state.traceId,
    updatedAt: state.updatedAt,
  };
}
