import { Injectable } from '@nestjs/common';
import type { GraphDefinition } from '../interfaces/graph-definition.interface';
import type { ConversationState } from '../interfaces/conversation-state.interface';

@Injectable()
export class InterruptController {
  shouldHaltBefore(graph: GraphDefinition, node: string): boolean {
    return graph.interruptBefore.has(node);
  }

  /**
   * State for a thread parked in front of `node`. Computed fields are kept;
   * only the interrupt bookkeeping changes.
   */
  markInterrupted(
    graph: GraphDefinition,
    state: ConversationState,
  ): ConversationState {
    const reply = graph.interruptReply(state) ?? state.fields.draftReply;
    return {
      ...state,
      fields:
        reply === undefined
          ? state.fields
          : { ...state.fields, finalReply: reply },
      awaitingExternalInput: true,
      resolved: false,
    };
  }
}
