/**
 * @fileoverview Bounded worker pool
 *
 * @module @ruleboard/engine/engine/pool
 */

/**
 * Map over items with at most `concurrency` calls in flight.
 * Results are returned in input order regardless of completion order.
 *
 * @example
 * ```typescript
 * const documents = await mapWithConcurrency(sources, 4, (source) => fetcher.fetch(source));
 * ```
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    concurrency: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    const workerCount = Math.max(1, Math.min(Math.floor(concurrency), items.length));
    let next = 0;

    const run = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await worker(items[index], index);
        }
    };

    await Promise.all(Array.from({ length: workerCount }, run));
    return results;
}
