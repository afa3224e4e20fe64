import { randomBytes } from 'node:crypto'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { SessionLog } from '../memory/session-log.js'
import { RUN_START_TAG } from '../memory/types.js'

export type SubtaskStatus = 'pending' | 'success' | 'failure'

export interface SubtaskEntry {
    step: number
    tool: string
    status: SubtaskStatus
}

export interface CreateSessionOptions {
    fs: FileSystem
    sessionsDir: string
    /** Text the loop starts from; may carry injected history. Defaults to `query`. */
    userInput?: string
    now?: Date
    logger?: Logger
}

function pad(n: number): string {
    return String(n).padStart(2, '0')
}

export function createSessionId(now: Date = new Date()): string {
    const unix = Math.floor(now.getTime() / 1000)
    const uid = randomBytes(3).toString('hex')
    return `${now.getFullYear()}/${pad(now.getMonth() + 1)}/${pad(now.getDate())}/session-${unix}-${uid}`
}

/** Per-session state. The id is fixed at creation and the final answer can be set only once. */
export class SessionContext {
    readonly taskProgress: SubtaskEntry[] = []
    private _step = 0
    private _finalAnswer: string | undefined

    private constructor(
        readonly sessionId: string,
        readonly query: string,
        readonly userInput: string,
        readonly memory: SessionLog
    ) {}

    /** Creates the context and writes the run-start record to its session log. */
    static async create(query: string, options: CreateSessionOptions): Promise<SessionContext> {
        const now = options.now ?? new Date()
        const sessionId = createSessionId(now)
        const memory = new SessionLog(options.fs, options.sessionsDir, sessionId, options.logger)
        const ctx = new SessionContext(sessionId, query, options.userInput ?? query, memory)

        await memory.add({
            timestamp: now.getTime() / 1000,
            type: 'run_metadata',
            text: `Started new session with input: ${query} at ${now.toISOString()}`,
            session_id: sessionId,
            tags: [RUN_START_TAG],
            user_query: query,
            metadata: { start_time: now.toISOString(), step: 0 },
        })
        return ctx
    }

    get step(): number {
        return this._step
    }

    get finalAnswer(): string | undefined {
        return this._finalAnswer
    }

    advanceStep(): number {
        this._step++
        return this._step
    }

    logSubtask(tool: string, status: SubtaskStatus = 'pending'): void {
        this.taskProgress.push({ step: this._step, tool, status })
    }

    /** Updates the latest entry for `tool` in the current step. */
    updateSubtaskStatus(tool: string, status: SubtaskStatus): void {
        for (let i = this.taskProgress.length - 1; i >= 0; i--) {
            const entry = this.taskProgress[i]
            if (entry && entry.tool === tool && entry.step === this._step) {
                entry.status = status
                return
            }
        }
    }

    setFinalAnswer(answer: string): void {
        if (this._finalAnswer !== undefined) {
            throw new Error(`Final answer already set for session ${this.sessionId}`)
        }
        this._finalAnswer = answer
    }
}
