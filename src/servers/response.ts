import type { Result } from '../core/result.js'

export function textResponse(text: string) {
    return { content: [{ type: 'text' as const, text }] }
}

export function errorResponse(message: string) {
    return { content: [{ type: 'text' as const, text: `Error: ${message}` }], isError: true }
}

export function fromResult(result: Result<string>) {
    return result.ok ? textResponse(result.value) : errorResponse(result.error)
}
