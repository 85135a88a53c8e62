import { Teardown } from '../../../src/shared/teardown.js';

describe('Teardown', () => {
  it('runs cleanups newest first and returns the exit code', async () => {
    const order: string[] = [];
    const teardown = new Teardown();
    teardown.register('first', () => {
      order.push('first');
    });
    teardown.register('second', async () => {
      order.push('second');
    });

    expect(teardown.size).toBe(2);
    expect(await teardown.run(3)).toBe(3);
    expect(order).toEqual(['second', 'first']);
  });

  it('runs only once', async () => {
    const cleanup = jest.fn();
    const teardown = new Teardown();
    teardown.register('once', cleanup);

    await teardown.run(0);
    await teardown.run(1);
    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it('keeps the original exit code when a cleanup fails', async () => {
    const after = jest.fn();
    const teardown = new Teardown();
    teardown.register('later', after);
    teardown.register('broken', () => {
      throw new Error('cannot remove');
    });

    expect(await teardown.run(130)).toBe(130);
    expect(after).toHaveBeenCalled();
  });
});
