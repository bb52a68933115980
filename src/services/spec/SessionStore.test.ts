/**
 * SessionStore Tests
 */

import { SessionStore } from './SessionStore';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('SessionStore', () => {
  it('creates sessions with default settings', () => {
    const store = new SessionStore();
    const session = store.create({ orgUrl: 'https://dev.azure.com/example-org' });

    expect(store.get(session.id)).toBe(session);
    expect(session.settings).toEqual({ orgUrl: 'https://dev.azure.com/example-org', pat: '', codeAgent: 'claude-code' });
    expect(store.size()).toBe(1);
  });

  it('deletes sessions', () => {
    const store = new SessionStore();
    const session = store.create();

    expect(store.delete(session.id)).toBe(true);
    expect(store.get(session.id)).toBeUndefined();
    expect(store.delete(session.id)).toBe(false);
  });

  it('runs turns of one session one after another', async () => {
    const store = new SessionStore();
    const session = store.create();
    const order: string[] = [];
    const gate = deferred();

    const first = store.runExclusive(session, async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = store.runExclusive(session, async () => {
      order.push('second');
      return 2;
    });

    await Promise.resolve();
    gate.resolve();

    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('keeps running turns after one fails', async () => {
    const store = new SessionStore();
    const session = store.create();

    const failing = store.runExclusive(session, async () => {
      throw new Error('turn failed');
    });
    const next = store.runExclusive(session, async () => 'ok');

    await expect(failing).rejects.toThrow('turn failed');
    await expect(next).resolves.toBe('ok');
  });

  it('does not serialize different sessions against each other', async () => {
    const store = new SessionStore();
    const blocked = store.create();
    const other = store.create();
    const gate = deferred();

    const slow = store.runExclusive(blocked, () => gate.promise);
    await expect(store.runExclusive(other, async () => 'done')).resolves.toBe('done');

    gate.resolve();
    await slow;
  });
});
