import { BatchedErrors, InternalError, toError } from '../../errors/errors';

/**
 * Runs `fn` over `items` on `poolSize` lanes. Lane k takes the k-th
 * contiguous slice and works through it in order. Results keep item order;
 * every failure is collected and raised once all lanes are done.
 */
export async function mapInPool<T, R>(
  items: ReadonlyArray<T>,
  poolSize: number,
  fn: (item: T, index: number) => R | Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(poolSize) || poolSize < 1) {
    throw new InternalError(`pool size must be a positive integer, got ${poolSize}`);
  }
  const lanes = poolSize;
  const laneSize = Math.max(1, Math.ceil(items.length / lanes));
  const results: R[] = [];
  const failures: Array<{ index: number; error: Error }> = [];

  const runLane = async (start: number) => {
    const end = Math.min(items.length, start + laneSize);
    for (let index = start; index < end; index++) {
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failures.push({ index, error: toError(error) });
      }
    }
  };

  const running: Promise<void>[] = [];
  for (let start = 0; start < items.length; start += laneSize) running.push(runLane(start));
  await Promise.all(running);

  if (failures.length > 0) {
    failures.sort((a, b) => a.index - b.index);
    throw new BatchedErrors(failures.map(failure => failure.error));
  }
  return results;
}
