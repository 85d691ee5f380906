import { Logger } from '@nestjs/common';
import type { ConversationState } from '../../interfaces/conversation-state.interface';
import type { NodePatch } from '../../interfaces/graph-definition.interface';
import {
  ANGER_KEYWORDS,
  DELIVERY_FOLLOW_UP_KEYWORDS,
  ORDER_REFERENCE_PATTERN,
} from '../customer-service.constants';

const logger = new Logger('TriageNode');

export type CustomerIntent = 'faq' | 'order' | 'human';

export function extractOrderReference(message: string): string | undefined {
  return ORDER_REFERENCE_PATTERN.exec(message)?.[1];
}

/**
 * Classifies the message. Keyword rules, checked in order: anger escalates,
 * explicit order mentions go to order lookup, delivery follow-ups on a
 * thread that already carries an order number stay with that order.
 */
export function triageNode(state: Readonly<ConversationState>): NodePatch {
  const message = state.userMessage;
  const lower = message.toLowerCase();

  if (ANGER_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    logger.log(`Thread ${state.threadId}: escalating to human review`);
    return { intent: 'human', pendingAction: 'escalate' };
  }

  if (lower.includes('order') || message.includes('#')) {
    const orderReference = extractOrderReference(message);
    logger.log(
      `Thread ${state.threadId}: order query (${orderReference ?? state.fields.orderReference ?? 'no number'})`,
    );
    return orderReference
      ? { intent: 'order', orderReference }
      : { intent: 'order' };
  }

  if (
    state.fields.orderReference !== undefined &&
    DELIVERY_FOLLOW_UP_KEYWORDS.some((keyword) => lower.includes(keyword))
  ) {
    logger.log(
      `Thread ${state.threadId}: follow-up on order ${state.fields.orderReference}`,
    );
    return { intent: 'order' };
  }

  logger.log(`Thread ${state.threadId}: FAQ query`);
  return { intent: 'faq' };
}

export function routeByIntent(state: Readonly<ConversationState>): string {
  return state.fields.intent ?? 'faq';
}
