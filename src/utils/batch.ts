/**
 * @fileoverview Bounded concurrent mapping.
 * Items are processed in consecutive batches; every promise in a batch is
 * awaited before the next batch starts.
 *
 * @module utils/batch
 */

/**
 * Maps `items` through `fn`, running at most `batchSize` calls at a time.
 * The output keeps the input order.
 *
 * @param items - Inputs to map
 * @param batchSize - Maximum number of in-flight calls (values below 1 are treated as 1)
 * @param fn - Async mapper
 *
 * @example
 * const details = await mapInBatches(['1', '2', '3'], 2, id => connector.getIssueDetails(id));
 */
export async function mapInBatches<T, U>(
    items: readonly T[],
    batchSize: number,
    fn: (item: T, index: number) => Promise<U>
): Promise<U[]> {
    const size = Math.max(1, Math.floor(batchSize));
    const results: U[] = [];

    for (let i = 0; i < items.length; i += size) {
        const batch = items.slice(i, i + size);
        const settled = await Promise.all(batch.map((item, j) => fn(item, i + j)));
        results.push(...settled);
    }

    return results;
}
