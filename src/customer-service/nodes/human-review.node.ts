import { Logger } from '@nestjs/common';
import type { ConversationState } from '../../interfaces/conversation-state.interface';
import type { NodePatch } from '../../interfaces/graph-definition.interface';
import { REVIEW_ACTIONS } from '../customer-service.constants';
import { extractOrderReference } from './triage.node';

const logger = new Logger('HumanReviewNode');

export type ReviewDecision = 'approved' | 'denied' | 'needs-details';

export const REQUEST_DETAILS_ACTION = 'request-details';

export function parseReviewDecision(message: string): ReviewDecision {
  const lower = message.toLowerCase();
  if (/\b(approved?|approving)\b/.test(lower)) return 'approved';
  if (/\b(denied|deny|rejected?)\b/.test(lower)) return 'denied';
  return 'needs-details';
}

/**
 * Runs once a reviewer has answered the escalation. The reviewer's reply is
 * the current user message.
 */
export function humanReviewNode(state: Readonly<ConversationState>): NodePatch {
  const message = state.userMessage;
  const decision = parseReviewDecision(message);
  const lower = message.toLowerCase();
  const action = REVIEW_ACTIONS.find((candidate) => lower.includes(candidate));
  const orderReference =
    extractOrderReference(message) ?? state.fields.orderReference;

  logger.log(
    `Thread ${state.threadId}: review ${decision}${action ? ` (${action})` : ''}`,
  );

  const patch: NodePatch = orderReference ? { orderReference } : {};

  switch (decision) {
    case 'approved': {
      const subject = orderReference ? ` for order #${orderReference}` : '';
      return {
        ...patch,
        pendingAction: action ?? 'resolve',
        draftReply: action
          ? `A support specialist approved your ${action} request${subject}. You will receive a confirmation shortly.`
          : `A support specialist approved your request${subject}. You will receive a confirmation shortly.`,
      };
    }
    case 'denied':
      return {
        ...patch,
        pendingAction: 'none',
        draftReply:
          'A support specialist reviewed your request and could not approve it. Reply here if you would like to discuss other options.',
      };
    case 'needs-details':
      return {
        ...patch,
        pendingAction: REQUEST_DETAILS_ACTION,
        draftReply:
          'A support specialist needs more information to resolve your case. Please share any additional details.',
      };
  }
}
