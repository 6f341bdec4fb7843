import { describe, expect, it } from 'vitest';
import { BatchedErrors, InternalError } from '../../src/errors/errors';
import { mapInPool } from '../../src/core/render/workerPool';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('mapInPool', () => {
  it('keeps item order whatever order lanes finish in', async () => {
    const results = await mapInPool([30, 5, 20, 1], 4, async ms => {
      await delay(ms);
      return ms * 2;
    });
    expect(results).toEqual([60, 10, 40, 2]);
  });

  it('returns the same results for every pool size', async () => {
    const items = ['a', 'b', 'c', 'd', 'e'];
    const one = await mapInPool(items, 1, (item, index) => `${index}:${item}`);
    const three = await mapInPool(items, 3, (item, index) => `${index}:${item}`);
    expect(three).toEqual(one);
  });

  it('runs every item and raises all failures in item order', async () => {
    const seen: number[] = [];
    const run = mapInPool([1, 2, 3, 4], 2, async item => {
      seen.push(item);
      if (item % 2 === 0) throw new Error(`fail ${item}`);
      return item;
    });

    const error = await run.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(BatchedErrors);
    if (error instanceof BatchedErrors) {
      expect(error.errors.map(item => item.message)).toEqual(['fail 2', 'fail 4']);
    }
    expect([...seen].sort()).toEqual([1, 2, 3, 4]);
  });

  it('handles an empty list', async () => {
    expect(await mapInPool([], 4, item => item)).toEqual([]);
  });

  it('refuses a pool size that is not a positive integer', async () => {
    await expect(mapInPool([1, 2, 3], Number.NaN, item => item * 2)).rejects.toBeInstanceOf(InternalError);
    await expect(mapInPool([1, 2, 3], 1.5, item => item * 2)).rejects.toThrow(
      'Internal error: pool size must be a positive integer, got 1.5',
    );
  });
});
