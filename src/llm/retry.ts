import { classifyError, isAbortError } from '../core/errors.js'

export interface RetryOptions {
    maxRetries: number
    baseDelay: number
    maxDelay: number
    onRetry?: (attempt: number, error: unknown) => void
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 3,
    baseDelay: 1000,
    maxDelay: 30000,
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Retries transient failures with exponential backoff plus 10% jitter. */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = DEFAULT_RETRY_OPTIONS): Promise<T> {
    let attempt = 0
    while (true) {
        try {
            return await fn()
        } catch (error) {
            if (isAbortError(error) || classifyError(error) === 'permanent' || attempt >= opts.maxRetries) {
                throw error
            }
            opts.onRetry?.(attempt + 1, error)
            const delay = Math.min(opts.baseDelay * 2 ** attempt, opts.maxDelay)
            await sleep(delay + delay * 0.1 * Math.random())
            attempt++
        }
    }
}

type CircuitState = 'closed' | 'open' | 'half_open'

export class CircuitOpenError extends Error {
    constructor(name: string) {
        super(`Circuit breaker '${name}' is open`)
        this.name = 'CircuitOpenError'
    }
}

export class CircuitBreaker {
    private state: CircuitState = 'closed'
    private failures = 0
    private lastFailure = 0

    constructor(
        private name: string,
        private threshold = 5,
        private cooldownMs = 30000
    ) {}

    async execute<T>(fn: () => Promise<T>): Promise<T> {
        if (this.state === 'open') {
            if (Date.now() - this.lastFailure <= this.cooldownMs) {
                throw new CircuitOpenError(this.name)
            }
            this.state = 'half_open'
        }

        try {
            const result = await fn()
            this.failures = 0
            this.state = 'closed'
            return result
        } catch (error) {
            if (!isAbortError(error)) this.recordFailure()
            throw error
        }
    }

    private recordFailure(): void {
        this.failures++
        this.lastFailure = Date.now()
        if (this.state === 'half_open' || this.failures >= this.threshold) {
            this.state = 'open'
        }
    }

    getState(): CircuitState {
        return this.state
    }
}
