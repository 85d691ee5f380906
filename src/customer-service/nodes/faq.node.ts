import type { ConversationState } from '../../interfaces/conversation-state.interface';
import type { NodePatch } from '../../interfaces/graph-definition.interface';
import { FAQ_ANSWERS, FAQ_CLARIFICATION } from '../customer-service.constants';

export function faqNode(state: Readonly<ConversationState>): NodePatch {
  const lower = state.userMessage.toLowerCase();
  const match = FAQ_ANSWERS.find(([keyword]) => lower.includes(keyword));
  return { draftReply: match ? match[1] : FAQ_CLARIFICATION };
}
