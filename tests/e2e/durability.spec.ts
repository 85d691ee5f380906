import { InMemoryStateStore } from '../../src/adapters/in-memory-state-store.adapter';
import { ESCALATION_NOTICE } from '../../src/customer-service/customer-service.constants';
import { createEngineHarness } from '../helpers';

describe('E2E: Durability across restarts', () => {
  let store: InMemoryStateStore;

  beforeEach(() => {
    store = new InMemoryStateStore();
  });

  it('should continue a conversation in a fresh engine over the same store', async () => {
    const before = createEngineHarness({ store });
    const first = await before.service.runTurn('u1', 'Status of order #11111?');

    const after = createEngineHarness({ store });
    const second = await after.service.runTurn(
      'u1',
      'Has it shipped?',
      first.sessionId,
    );

    expect(second.isNewThread).toBe(false);
    expect(second.state.fields.orderReference).toBe('11111');
    expect(second.state.fields.finalReply).toBe(
      'Order #11111 status: Processing\nExpected delivery: Dec 15\n\nIs there anything else I can help you with?',
    );
    expect(second.state.turns.map((t) => t.role)).toEqual([
      'user',
      'assistant',
      'user',
      'assistant',
    ]);
  });

  it('should resume a paused review after a restart', async () => {
    const before = createEngineHarness({ store });
    const escalated = await before.service.runTurn('u1', 'I am furious about this');
    expect(escalated.state.fields.finalReply).toBe(ESCALATION_NOTICE);

    const after = createEngineHarness({ store });
    const reviewed = await after.service.runTurn(
      'u1',
      'Denied: outside the return window',
      escalated.sessionId,
    );

    expect(reviewed.status).toBe('completed');
    if (reviewed.status !== 'completed') return;
    expect(reviewed.visitedNodes).toEqual(['human', 'tone']);
    expect(reviewed.state.fields.pendingAction).toBe('none');
    expect(reviewed.state.resolved).toBe(true);
  });

  it('should keep every session of a user independent', async () => {
    const harness = createEngineHarness({ store });
    const orderSession = await harness.service.runTurn('u1', 'order #12345');
    const faqSession = await harness.service.runTurn('u1', 'contact details?');

    const restarted = createEngineHarness({ store });
    const followUp = await restarted.service.runTurn(
      'u1',
      'where is it?',
      faqSession.sessionId,
    );

    expect(orderSession.sessionId).not.toBe(faqSession.sessionId);
    expect(followUp.state.fields.orderReference).toBeUndefined();
    expect(followUp.state.fields.intent).toBe('faq');
  });
});
