import { describe, expect, it } from 'vitest';
import { SessionRegistry } from '../src/session/sessionRegistry.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('SessionRegistry', () => {
  it('keeps one session per user', () => {
    const registry = new SessionRegistry();
    const first = registry.getOrCreate('u1');
    expect(registry.getOrCreate('u1')).toBe(first);
    expect(registry.getOrCreate('u2')).not.toBe(first);
    expect(registry.get('u3')).toBeUndefined();
    expect(registry.size()).toBe(2);
  });

  it('runs tasks for the same user one after another', async () => {
    const registry = new SessionRegistry();
    const gate = deferred();
    const events: string[] = [];

    const first = registry.runExclusive('u1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = registry.runExclusive('u1', async () => {
      events.push('second');
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not make different users wait on each other', async () => {
    const registry = new SessionRegistry();
    const gate = deferred();
    const events: string[] = [];

    const blocked = registry.runExclusive('u1', async () => {
      await gate.promise;
      events.push('u1');
    });
    await registry.runExclusive('u2', async () => {
      events.push('u2');
    });

    expect(events).toEqual(['u2']);
    gate.resolve();
    await blocked;
    expect(events).toEqual(['u2', 'u1']);
  });

  it('passes failures to the caller and keeps the queue moving', async () => {
    const registry = new SessionRegistry();

    const failing = registry.runExclusive('u1', async () => {
      throw new Error('boom');
    });
    const next = registry.runExclusive('u1', async () => 'after');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('after');
  });

  it('drops the queue entry once a user has no pending work', async () => {
    const registry = new SessionRegistry();
    await registry.runExclusive('u1', async () => undefined);
    // The tail cleanup runs a couple of microtasks after the task settles
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(registry.pendingQueues()).toBe(0);
  });
});
