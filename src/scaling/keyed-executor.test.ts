import { KeyedExecutor } from './keyed-executor';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedExecutor', () => {
  it('runs a burst in one lane by (createdAt, id), not arrival order', async () => {
    const executor = new KeyedExecutor();
    const order: string[] = [];
    const record = (label: string) => async () => {
      order.push(label);
      return label;
    };

    const results = await Promise.all([
      executor.submit('tx', { createdAt: 30, id: 'c' }, record('third')),
      executor.submit('tx', { createdAt: 10, id: 'b' }, record('second')),
      executor.submit('tx', { createdAt: 10, id: 'a' }, record('first')),
    ]);

    expect(order).toEqual(['first', 'second', 'third']);
    expect(results).toEqual(['third', 'second', 'first']);
  });

  it('runs one task at a time per key', async () => {
    const executor = new KeyedExecutor();
    const gate = deferred();
    const order: string[] = [];

    const slow = executor.submit('tx', { createdAt: 1, id: 'a' }, async () => {
      order.push('slow:start');
      await gate.promise;
      order.push('slow:end');
    });
    const fast = executor.submit('tx', { createdAt: 2, id: 'b' }, async () => {
      order.push('fast');
    });

    await new Promise(resolve => setImmediate(resolve));
    expect(order).toEqual(['slow:start']);

    gate.resolve();
    await Promise.all([slow, fast]);
    expect(order).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('lets different keys proceed while one lane is blocked', async () => {
    const executor = new KeyedExecutor();
    const gate = deferred();

    const blocked = executor.submit('one', { createdAt: 1, id: 'a' }, () => gate.promise);
    const other = await executor.submit('two', { createdAt: 1, id: 'b' }, async () => 'done');

    expect(other).toBe('done');
    await new Promise(resolve => setImmediate(resolve));
    expect(executor.getStats()).toEqual({ lanes: 1, pending: 1 });

    gate.resolve();
    await blocked;
    await executor.onIdle();
    expect(executor.getStats()).toEqual({ lanes: 0, pending: 0 });
  });

  it('propagates a task failure to its caller and keeps the lane going', async () => {
    const executor = new KeyedExecutor();

    const failing = executor.submit('tx', { createdAt: 1, id: 'a' }, async () => {
      throw new Error('boom');
    });
    const after = executor.submit('tx', { createdAt: 2, id: 'b' }, async () => 42);

    await expect(failing).rejects.toThrow('boom');
    await expect(after).resolves.toBe(42);
  });
});
