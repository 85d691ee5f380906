import type { ConversationState } from '../../interfaces/conversation-state.interface';
import type {
  NodeFunction,
  NodePatch,
} from '../../interfaces/graph-definition.interface';
import type { ReplyPolisher } from '../reply-polisher';
import { DEFAULT_DRAFT_REPLY } from '../customer-service.constants';

export function createToneNode(polisher: ReplyPolisher): NodeFunction {
  return async (state: Readonly<ConversationState>): Promise<NodePatch> => {
    const result = await polisher.polish({
      customerMessage: state.userMessage,
      draft: state.fields.draftReply ?? DEFAULT_DRAFT_REPLY,
    });
    return { finalReply: result.text, replySource: result.source };
  };
}
