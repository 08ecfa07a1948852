import { RunCancelledError } from '../errors';

/**
 * Runs `worker` over `items` with at most `limit` calls in flight.
 * Results keep the input order. Once `signal` aborts, no new item is started
 * and the call rejects with RunCancelledError after the in-flight calls settle.
 * Once a worker call rejects, no new item is started and the call rejects with that error.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>,
    signal?: AbortSignal
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;
    let cancelled = false;
    let failed = false;

    const runWorker = async (): Promise<void> => {
        while (next < items.length && !failed) {
            if (signal?.aborted) {
                cancelled = true;
                return;
            }
            const index = next++;
            try {
                results[index] = await worker(items[index], index);
            } catch (error) {
                failed = true;
                throw error;
            }
        }
    };

    const size = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: size }, () => runWorker()));

    if (cancelled) {
        throw new RunCancelledError();
    }
    return results;
}
