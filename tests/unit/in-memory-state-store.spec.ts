import { InMemoryStateStore } from '../../src/adapters/in-memory-state-store.adapter';
import { CheckpointConflictError } from '../../src/errors/checkpoint-conflict.error';

describe('InMemoryStateStore', () => {
  let store: InMemoryStateStore;

  beforeEach(() => {
    store = new InMemoryStateStore();
  });

  it('should report itself as not durable', () => {
    expect(store.durable).toBe(false);
  });

  it('should return null for an unknown thread', async () => {
    expect(await store.get('ns', 'missing')).toBeNull();
  });

  it('should insert the first version and read it back', async () => {
    await store.put('ns', 't1', { version: 1, payload: { a: 1 } }, null);

    const row = await store.get('ns', 't1');
    expect(row).toMatchObject({
      threadId: 't1',
      namespace: 'ns',
      version: 1,
      payload: { a: 1 },
    });
    expect(row?.updatedAt).toBeInstanceOf(Date);
  });

  it('should advance only from the expected version', async () => {
    await store.put('ns', 't1', { version: 1, payload: { a: 1 } }, null);
    await store.put('ns', 't1', { version: 2, payload: { a: 2 } }, 1);

    await expect(
      store.put('ns', 't1', { version: 2, payload: { a: 3 } }, 1),
    ).rejects.toThrow(CheckpointConflictError);
    await expect(
      store.put('ns', 't1', { version: 1, payload: { a: 4 } }, null),
    ).rejects.toThrow(CheckpointConflictError);

    const row = await store.get('ns', 't1');
    expect(row?.version).toBe(2);
    expect(row?.payload).toEqual({ a: 2 });
  });

  it('should reject an update for a thread that was never written', async () => {
    await expect(
      store.put('ns', 't1', { version: 5, payload: {} }, 4),
    ).rejects.toThrow('Checkpoint for ns/t1 is no longer at version 4');
  });

  it('should keep namespaces apart', async () => {
    await store.put('a', 't1', { version: 1, payload: { ns: 'a' } }, null);
    await store.put('b', 't1', { version: 1, payload: { ns: 'b' } }, null);

    expect((await store.get('a', 't1'))?.payload).toEqual({ ns: 'a' });
    expect((await store.get('b', 't1'))?.payload).toEqual({ ns: 'b' });
    expect(store.size()).toBe(2);
  });

  it('should isolate stored payloads from caller mutation', async () => {
    const payload: Record<string, unknown> = { list: [1] };
    await store.put('ns', 't1', { version: 1, payload }, null);
    payload.list = [2];

    const first = await store.get('ns', 't1');
    if (first) first.payload.list = [3];

    expect((await store.get('ns', 't1'))?.payload).toEqual({ list: [1] });
  });

  it('should drop everything on close', async () => {
    await store.put('ns', 't1', { version: 1, payload: {} }, null);
    await store.close();
    expect(store.size()).toBe(0);
  });
});
