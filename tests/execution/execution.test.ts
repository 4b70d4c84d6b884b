/**
 * gatehouse - Execution Strategy Tests
 */

import { describe, it, expect } from 'vitest';
import { createDirectExecution, createQueuedExecution } from '../../src/execution';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => (resolve = r));
  return { promise, resolve };
}

describe('createDirectExecution', () => {
  it('should run the task and pass its result through', async () => {
    const execution = createDirectExecution();

    expect(await execution.run(async () => 42)).toBe(42);
    expect(execution.kind).toBe('direct');
  });

  it('should propagate rejections', async () => {
    const execution = createDirectExecution();

    await expect(execution.run(async () => Promise.reject(new Error('nope')))).rejects.toThrow('nope');
  });
});

describe('createQueuedExecution', () => {
  it('should reject an invalid concurrency', () => {
    expect(() => createQueuedExecution({ concurrency: 0 })).toThrow(RangeError);
  });

  it('should bound calls in flight and start queued calls in order', async () => {
    const execution = createQueuedExecution({ concurrency: 2 });
    const started: string[] = [];
    const gates = { a: deferred<void>(), b: deferred<void>(), c: deferred<void>() };

    const track = (name: keyof typeof gates) =>
      execution.run(async () => {
        started.push(name);
        await gates[name].promise;
        return name;
      });

    const a = track('a');
    const b = track('b');
    const c = track('c');
    await Promise.resolve();

    expect(started).toEqual(['a', 'b']);
    expect(execution.active).toBe(2);
    expect(execution.pending).toBe(1);

    gates.a.resolve();
    expect(await a).toBe('a');
    await Promise.resolve();
    expect(started).toEqual(['a', 'b', 'c']);

    gates.b.resolve();
    gates.c.resolve();
    expect(await Promise.all([b, c])).toEqual(['b', 'c']);
    expect(execution.active).toBe(0);
    expect(execution.pending).toBe(0);
  });

  it('should release the slot when a task fails', async () => {
    const execution = createQueuedExecution({ concurrency: 1 });

    await expect(execution.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

    expect(await execution.run(async () => 'next')).toBe('next');
    expect(execution.active).toBe(0);
  });
});
