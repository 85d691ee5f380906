import { deriveGraphId } from '../../src/utils/derive-graph-id';

describe('deriveGraphId', () => {
  it.each([
    ['CustomerServiceGraph', 'customer_service'],
    ['Billing', 'billing'],
    ['RefundReviewGraph', 'refund_review'],
    ['Graph', 'graph'],
  ])('should derive %s -> %s', (className, expected) => {
    expect(deriveGraphId(className)).toBe(expected);
  });
});
