export type ErrorKind = 'transient' | 'permanent'

export class StepperError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'StepperError'
        this.kind = kind
    }
}

export class TransientError extends StepperError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transient', options)
        this.name = 'TransientError'
    }
}

export class PermanentError extends StepperError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'PermanentError'
    }
}

export class ToolNotFoundError extends PermanentError {
    readonly toolName: string

    constructor(toolName: string) {
        super(`Tool '${toolName}' not found on any server.`)
        this.name = 'ToolNotFoundError'
        this.toolName = toolName
    }
}

/** Transport or protocol failure while talking to a tool server. */
export class ToolInvocationError extends TransientError {
    readonly toolName: string
    readonly serverId: string

    constructor(toolName: string, serverId: string, options?: ErrorOptions) {
        const cause = options?.cause === undefined ? '' : `: ${errorMessage(options.cause)}`
        super(`Tool '${toolName}' on server '${serverId}' failed${cause}`, options)
        this.name = 'ToolInvocationError'
        this.toolName = toolName
        this.serverId = serverId
    }
}

export class PlanResourceExhaustedError extends PermanentError {
    readonly limit: number

    constructor(limit: number) {
        super(`Exceeded max tool calls (${limit}) in solve() plan.`)
        this.name = 'PlanResourceExhaustedError'
        this.limit = limit
    }
}

export class PlanExecutionError extends PermanentError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = 'PlanExecutionError'
    }
}

export class PerceptionParseError extends PermanentError {
    readonly raw: string

    constructor(message: string, raw: string, options?: ErrorOptions) {
        super(message, options)
        this.name = 'PerceptionParseError'
        this.raw = raw
    }
}

export class IndexUnavailableError extends TransientError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = 'IndexUnavailableError'
    }
}

export class ConfigurationError extends PermanentError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = 'ConfigurationError'
    }
}

export function classifyHttpError(status: number): ErrorKind {
    if ([429, 500, 502, 503, 504].includes(status)) return 'transient'
    return 'permanent'
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof DOMException && error.name === 'AbortError') return true
    if (error instanceof Error && error.name === 'AbortError') return true
    return false
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof StepperError) return error.kind
    if (error instanceof TypeError && error.message.includes('fetch')) return 'transient'
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return classifyHttpError(error.status)
    }
    return 'permanent'
}
