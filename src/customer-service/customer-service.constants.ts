export const CUSTOMER_SERVICE_GRAPH_ID = 'customer_service';

export const ANGER_KEYWORDS = [
  'angry',
  'furious',
  'unacceptable',
  'refund now',
  'cancel immediately',
];

export const DELIVERY_FOLLOW_UP_KEYWORDS = [
  'arrive',
  'deliver',
  'shipped',
  'where is',
  'status',
];

export const ORDER_REFERENCE_PATTERN = /#?(\d{5})/;

/** Checked in order; the first keyword found in the message wins. */
export const FAQ_ANSWERS: ReadonlyArray<readonly [string, string]> = [
  [
    'return',
    'Our return policy allows returns within 30 days of purchase. Items must be unused and in original packaging.',
  ],
  [
    'shipping',
    'Standard shipping takes 5-7 business days. Express shipping is available for 2-3 day delivery.',
  ],
  ['payment', 'We accept all major credit cards, PayPal, and Apple Pay.'],
  [
    'contact',
    'You can reach us at support@example.com or call 1-800-SUPPORT.',
  ],
];

export const FAQ_CLARIFICATION =
  "I'd be happy to help! Could you please provide more details about your question?";

export interface MockOrder {
  status: string;
  delivery: string;
}

export const MOCK_ORDERS: Readonly<Record<string, MockOrder>> = {
  '12345': { status: 'In Transit', delivery: 'Thursday, Dec 12' },
  '67890': { status: 'Delivered', delivery: 'Dec 8' },
  '11111': { status: 'Processing', delivery: 'Dec 15' },
};

export const ESCALATION_NOTICE =
  'Your request has been escalated to a support engineer. ' +
  'A human specialist will review your case and respond shortly. ' +
  'Please provide any additional details that may help resolve your issue.';

export const REVIEW_ACTIONS = ['refund', 'cancel', 'replace'];

export const DEFAULT_DRAFT_REPLY = "I'm here to help!";
