export type PoolOutcome<T> =
    | { status: "fulfilled"; value: T }
    | { status: "rejected"; reason: unknown }
    | { status: "skipped" }

export interface PoolOptions {
    concurrency: number
    signal?: AbortSignal
    /** Checked before each item starts; false stops the pool from taking more. */
    canStart?: () => boolean
}

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 * Outcomes keep the input order. Once the signal aborts or `canStart`
 * refuses, the items not yet started are reported as skipped; the pool
 * itself never rejects.
 */
export async function runPool<TIn, TOut>(
    items: readonly TIn[],
    fn: (item: TIn, index: number) => Promise<TOut>,
    options: PoolOptions
): Promise<PoolOutcome<TOut>[]> {
    const outcomes = items.map(
        (): PoolOutcome<TOut> => ({ status: "skipped" })
    )
    if (items.length === 0) return outcomes

    const limit = Math.max(1, Math.min(options.concurrency, items.length))
    let nextIndex = 0
    let closed = false

    const worker = async (): Promise<void> => {
        while (!closed && nextIndex < items.length) {
            if (options.signal?.aborted || options.canStart?.() === false) {
                closed = true
                return
            }
            const current = nextIndex++
            try {
                const value = await fn(items[current], current)
                outcomes[current] = { status: "fulfilled", value }
            } catch (reason) {
                outcomes[current] = { status: "rejected", reason }
            }
        }
    }

    await Promise.all(Array.from({ length: limit }, worker))
    return outcomes
}
