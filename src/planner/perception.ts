import { PerceptionParseError } from '../core/errors.js'
import { type Perception, PerceptionReplySchema } from './types.js'

/** Removes a surrounding markdown fence (```json, ```js, ...) if present. */
export function stripCodeFences(raw: string): string {
    const text = raw.trim()
    if (!text.startsWith('```')) return text
    const firstNewline = text.indexOf('\n')
    const body = firstNewline === -1 ? text.slice(3) : text.slice(firstNewline + 1)
    const end = body.lastIndexOf('```')
    return (end === -1 ? body : body.slice(0, end)).trim()
}

/** Parses the whole string, or else the first balanced `{...}` object in it. */
export function extractJSON(raw: string): unknown {
    try {
        return JSON.parse(raw)
    } catch {
        // fall through to brace matching
    }

    const start = raw.indexOf('{')
    if (start === -1) return null

    let depth = 0
    let inString = false
    for (let i = start; i < raw.length; i++) {
        const ch = raw[i]
        if (inString) {
            if (ch === '\\') i++
            else if (ch === '"') inString = false
            continue
        }
        if (ch === '"') inString = true
        else if (ch === '{') depth++
        else if (ch === '}') depth--
        if (depth === 0) {
            try {
                return JSON.parse(raw.slice(start, i + 1))
            } catch {
                return null
            }
        }
    }
    return null
}

export function parsePerception(raw: string, userInput: string): Perception {
    const json = extractJSON(stripCodeFences(raw))
    if (json === null || typeof json !== 'object') {
        throw new PerceptionParseError('Failed to parse perception JSON from model response.', raw)
    }

    const result = PerceptionReplySchema.safeParse(json)
    if (!result.success) {
        const issue = result.error.issues[0]
        const detail = issue ? `${issue.path.join('.') || 'reply'}: ${issue.message}` : 'invalid shape'
        throw new PerceptionParseError(`Perception reply does not match the expected shape (${detail})`, raw, {
            cause: result.error,
        })
    }

    return {
        userInput,
        intent: result.data.intent,
        entities: result.data.entities,
        toolHint: result.data.tool_hint,
        selectedServers: result.data.selected_servers,
    }
}

export function defaultPerception(userInput: string, serverIds: readonly string[]): Perception {
    return {
        userInput,
        intent: '',
        entities: [],
        toolHint: '',
        selectedServers: [...serverIds],
    }
}
