import { CompletionAbortedError } from "./errors.js"

interface Waiter {
    grant: () => void
}

/** Counting semaphore whose waiters leave the queue when their signal aborts. */
export class Semaphore {
    private permits: number
    private readonly maxPermits: number
    private readonly queue: Waiter[] = []

    constructor(maxPermits: number) {
        this.permits = maxPermits
        this.maxPermits = maxPermits
    }

    public async acquire(signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) {
            throw new CompletionAbortedError("Aborted before acquiring a slot")
        }
        if (this.permits > 0) {
            this.permits--
            return
        }

        await new Promise<void>((resolve, reject) => {
            const onAbort = (): void => {
                const index = this.queue.indexOf(waiter)
                if (index !== -1) this.queue.splice(index, 1)
                reject(
                    new CompletionAbortedError("Aborted while waiting for a slot")
                )
            }
            const waiter: Waiter = {
                grant: () => {
                    signal?.removeEventListener("abort", onAbort)
                    resolve()
                },
            }
            this.queue.push(waiter)
            signal?.addEventListener("abort", onAbort, { once: true })
        })
    }

    public release(): void {
        const next = this.queue.shift()
        if (next) {
            next.grant()
        } else if (this.permits < this.maxPermits) {
            this.permits++
        }
    }

    public async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        await this.acquire(signal)
        try {
            return await fn()
        } finally {
            this.release()
        }
    }

    public getState(): { available: number; queued: number } {
        return { available: this.permits, queued: this.queue.length }
    }
}
