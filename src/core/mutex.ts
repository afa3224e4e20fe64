/**
 * Promise-chain mutual exclusion. Callers queue in arrival order; a rejected
 * critical section releases the lock and rethrows to its own caller only.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve()
    private pending = 0

    async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
        const previous = this.tail
        let release: () => void = () => {}
        this.tail = new Promise<void>((resolve) => {
            release = resolve
        })
        this.pending++

        await previous
        try {
            return await fn()
        } finally {
            this.pending--
            release()
        }
    }

    isLocked(): boolean {
        return this.pending > 0
    }
}
