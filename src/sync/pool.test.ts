import { describe, expect, it } from 'vitest';

import { runPool } from './pool.js';

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('runPool', () => {
  it('returns outcomes in input order', async () => {
    const outcomes = await runPool([30, 10, 20], 3, async (ms) => {
      await wait(ms);
      return ms * 2;
    });
    expect(outcomes).toEqual([
      { status: 'fulfilled', value: 60 },
      { status: 'fulfilled', value: 20 },
      { status: 'fulfilled', value: 40 },
    ]);
  });

  it('never runs more than `concurrency` workers at once', async () => {
    let inFlight = 0;
    let peak = 0;
    await runPool([1, 2, 3, 4, 5, 6], 2, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await wait(5);
      inFlight--;
    });
    expect(peak).toBe(2);
  });

  it('captures rejections without stopping other items', async () => {
    const outcomes = await runPool(['ok', 'bad', 'ok'], 2, async (item) => {
      if (item === 'bad') throw new Error('nope');
      return item;
    });
    expect(outcomes[0]).toEqual({ status: 'fulfilled', value: 'ok' });
    expect(outcomes[1].status).toBe('rejected');
    expect(outcomes[2]).toEqual({ status: 'fulfilled', value: 'ok' });
  });

  it('starts nothing new once aborted but lets in-flight work finish', async () => {
    const controller = new AbortController();
    const finished: number[] = [];

    const outcomes = await runPool(
      [1, 2, 3],
      1,
      async (item) => {
        if (item === 1) controller.abort();
        await wait(5);
        finished.push(item);
        return item;
      },
      controller.signal
    );

    expect(finished).toEqual([1]);
    expect(outcomes).toEqual([
      { status: 'fulfilled', value: 1 },
      { status: 'not-started' },
      { status: 'not-started' },
    ]);
  });

  it('handles an empty list', async () => {
    expect(await runPool([], 4, async () => 1)).toEqual([]);
  });
});
