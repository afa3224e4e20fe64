import type { Container } from '../core/container.js'
import { applyInputHeuristics } from '../input/heuristics.js'
import { SessionContext } from './context.js'
import type { LoopOutcome } from './loop.js'

export type SessionResult =
    | { status: 'rejected'; message: string }
    | (LoopOutcome & { sessionId: string; injected: boolean })

/**
 * One query end to end: input screening, history injection, then the loop.
 * A rejected input starts no session and writes nothing.
 */
export async function runSession(container: Container, raw: string, signal?: AbortSignal): Promise<SessionResult> {
    const screened = applyInputHeuristics(raw)
    if (!screened.allowed) return { status: 'rejected', message: screened.message }

    const { config, memoryIndex, agentLoop, fs, logger } = container
    const query = screened.text
    const userInput = config.memory.enabled
        ? await memoryIndex.selectForInjection(query, config.memory.maxResults, config.memory.distanceThreshold, signal)
        : query

    const ctx = await SessionContext.create(query, {
        fs,
        sessionsDir: config.memory.sessionsDir,
        userInput,
        logger,
    })
    const outcome = await agentLoop.run(ctx, signal)
    return { ...outcome, sessionId: ctx.sessionId, injected: userInput !== query }
}
