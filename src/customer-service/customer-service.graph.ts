import { Inject, Injectable } from '@nestjs/common';
import { DurableGraph } from '../decorators/durable-graph.decorator';
import {
  END,
  type GraphProvider,
  type GraphSpec,
} from '../interfaces/graph-definition.interface';
import { faqNode } from './nodes/faq.node';
import {
  humanReviewNode,
  REQUEST_DETAILS_ACTION,
} from './nodes/human-review.node';
import { orderNode } from './nodes/order.node';
import { createToneNode } from './nodes/tone.node';
import { routeByIntent, triageNode } from './nodes/triage.node';
import { REPLY_POLISHER, type ReplyPolisher } from './reply-polisher';
import {
  CUSTOMER_SERVICE_GRAPH_ID,
  ESCALATION_NOTICE,
} from './customer-service.constants';

/**
 * triage -> faq | order | human, each -> tone -> END.
 * Execution pauses before `human` until a reviewer replies.
 */
@DurableGraph({ id: CUSTOMER_SERVICE_GRAPH_ID })
@Injectable()
export class CustomerServiceGraph implements GraphProvider {
  constructor(
    @Inject(REPLY_POLISHER) private readonly polisher: ReplyPolisher,
  ) {}

  define(): GraphSpec {
    return {
      id: CUSTOMER_SERVICE_GRAPH_ID,
      start: 'triage',
      nodes: {
        triage: triageNode,
        faq: faqNode,
        order: orderNode,
        human: humanReviewNode,
        tone: createToneNode(this.polisher),
      },
      edges: {
        triage: {
          router: routeByIntent,
          targets: { faq: 'faq', order: 'order', human: 'human' },
        },
        faq: 'tone',
        order: 'tone',
        human: 'tone',
        tone: END,
      },
      interruptBefore: ['human'],
      interruptReply: () => ESCALATION_NOTICE,
      // A reviewer asking for details leaves the case open.
      resolveOnTerminal: (state) =>
        state.fields.pendingAction !== REQUEST_DETAILS_ACTION,
    };
  }
}
