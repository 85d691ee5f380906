import { Logger } from '@nestjs/common';
import type { ConversationState } from '../../interfaces/conversation-state.interface';
import type { NodePatch } from '../../interfaces/graph-definition.interface';
import { MOCK_ORDERS } from '../customer-service.constants';

const logger = new Logger('OrderNode');

export function orderNode(state: Readonly<ConversationState>): NodePatch {
  const orderReference = state.fields.orderReference;
  if (!orderReference) {
    return {
      draftReply:
        "I'd be happy to help with your order. Could you provide your order number? (Format: #12345)",
    };
  }

  const order = Object.prototype.hasOwnProperty.call(MOCK_ORDERS, orderReference)
    ? MOCK_ORDERS[orderReference]
    : undefined;
  logger.log(`Order lookup for #${orderReference}: ${order?.status ?? 'not found'}`);

  if (!order) {
    return {
      draftReply: `I couldn't find order #${orderReference}. Please check the order number and try again.`,
    };
  }

  return {
    draftReply:
      `Order #${orderReference} status: ${order.status}\n` +
      `Expected delivery: ${order.delivery}\n\n` +
      'Is there anything else I can help you with?',
  };
}
