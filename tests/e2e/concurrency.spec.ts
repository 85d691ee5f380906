import { InMemoryStateStore } from '../../src/adapters/in-memory-state-store.adapter';
import type { GraphSpec } from '../../src/interfaces/graph-definition.interface';
import { createEngineHarness } from '../helpers';

function gatedGraph(gate: Promise<void>): GraphSpec {
  return {
    id: 'gated',
    start: 'answer',
    nodes: {
      answer: async (state) => {
        if (state.userMessage === 'hold') await gate;
        return { finalReply: `ack: ${state.userMessage}` };
      },
    },
  };
}

describe('E2E: Concurrency', () => {
  it('should serialize turns on one thread within a process', async () => {
    const { service, store } = createEngineHarness();
    const first = await service.runTurn('u1', 'What is your return policy?');

    const [a, b] = await Promise.all([
      service.runTurn('u1', 'and shipping?', first.sessionId),
      service.runTurn('u1', 'and payment?', first.sessionId),
    ]);

    expect(a.status).toBe('completed');
    expect(b.status).toBe('completed');
    expect(b.state.turns).toHaveLength(6);
    expect(b.state.turns.map((t) => t.content).slice(2, 4)).toEqual([
      'and shipping?',
      a.state.fields.finalReply,
    ]);
    const stored = await store.get('customer_service', first.threadId);
    expect(stored?.version).toBe(9);
  });

  it('should report a busy thread while a turn runs', async () => {
    let release = (): void => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { service } = createEngineHarness({ graphs: [gatedGraph(gate)] });

    const pending = service.runTurn('u1', 'hold', 's1');
    await new Promise((resolve) => setImmediate(resolve));

    expect(service.isThreadBusy('u1', 's1')).toBe(true);
    expect(service.isThreadBusy('u1', 's2')).toBe(false);

    release();
    await pending;
    expect(service.isThreadBusy('u1', 's1')).toBe(false);
  });

  it('should reject the losing writer when two processes share a thread', async () => {
    let release = (): void => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const store = new InMemoryStateStore();
    const graphs = [gatedGraph(gate)];
    const processA = createEngineHarness({ store, graphs });
    const processB = createEngineHarness({ store, graphs });
    await processA.service.runTurn('u1', 'hello', 's1');

    const turnA = processA.service.runTurn('u1', 'hold', 's1');
    const turnB = processB.service.runTurn('u1', 'hold', 's1');
    await new Promise((resolve) => setImmediate(resolve));
    release();
    const results = await Promise.all([turnA, turnB]);

    const statuses = results.map((r) => r.status).sort();
    expect(statuses).toEqual(['completed', 'failed']);
    const loser = results.find((r) => r.status === 'failed');
    expect(loser?.status === 'failed' && loser.error.kind).toBe('checkpoint');
    expect((await store.get('gated', 'u1:s1'))?.version).toBe(2);
  });
});
