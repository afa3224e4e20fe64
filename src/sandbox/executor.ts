import vm from 'node:vm'
import { PlanExecutionError, PlanResourceExhaustedError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { ToolCallPayload, ToolCallRecord } from '../mcp/types.js'

export const DEFAULT_MAX_TOOL_CALLS = 5

/** What the sandbox needs from the Dispatcher. */
export interface ToolCaller {
    callTool(name: string, args: Record<string, unknown>): Promise<ToolCallPayload>
}

export interface ExecuteOptions {
    maxToolCalls?: number
    onToolStart?: (toolName: string) => void
    onToolCall?: (record: ToolCallRecord) => void
}

export type ExecutionOutcome =
    | { status: 'success'; output: string; calls: ToolCallRecord[] }
    | { status: 'error'; error: string; output: string; calls: ToolCallRecord[] }

export function sandboxErrorText(message: string): string {
    return `[sandbox error: ${message}]`
}

export function isSandboxError(text: string): boolean {
    return text.startsWith('[sandbox error:')
}

// Errors raised inside the context belong to another realm, so `instanceof Error` misses them.
function describe(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message
    }
    return String(error)
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringify(value: unknown): string {
    if (typeof value === 'string') return value
    return JSON.stringify(value) ?? String(value)
}

export function normalizeResult(value: unknown): string {
    if (isRecord(value)) {
        if ('result' in value) return stringify(value.result)
        return stringify(value)
    }
    if (Array.isArray(value)) {
        return Array.from(value, stringify).join(' ')
    }
    return String(value)
}

function previewOf(payload: ToolCallPayload): string {
    return (payload.content[0]?.text ?? '').slice(0, 120)
}

/**
 * Installs `mcp` inside the context. The host bridge stays in this closure, and
 * payloads and errors cross as strings, so every object and function a plan can
 * reach belongs to the context realm. Intrinsics are captured before plan code
 * runs so a plan cannot redirect them.
 *
 * Each returned promise carries its own `then`, which is how `await`, `.then`,
 * `.catch` and the Promise combinators reach it; a failed call that never went
 * through it was never observed by the plan.
 */
const INSTALL_SOURCE = `'use strict';
(function install(bridge) {
    const P = Promise
    const Err = Error
    const then = P.prototype.then
    const apply = Reflect.apply
    const parse = JSON.parse
    const encode = JSON.stringify
    const freeze = Object.freeze
    const pin = Object.defineProperty
    const ignore = () => undefined
    const calls = []

    const describe = (error) => {
        try {
            if (error !== null && typeof error === 'object' && typeof error.message === 'string') return error.message
            return String(error)
        } catch (_) {
            return 'Unknown error'
        }
    }

    const callTool = function callTool(name, args) {
        const call = { observed: false, error: undefined }
        const promise = new P((resolve, reject) => {
            const json = args === undefined ? undefined : (encode(args) ?? 'null')
            bridge(typeof name === 'string' ? name : undefined, json, (ok, text) => {
                if (ok) {
                    resolve(parse(text))
                } else {
                    call.error = text
                    reject(new Err(text))
                }
            })
        })
        pin(promise, 'constructor', { value: undefined })
        pin(promise, 'then', {
            value: function (onFulfilled, onRejected) {
                call.observed = true
                return apply(then, promise, [onFulfilled, onRejected])
            },
        })
        // Un-awaited calls must not surface as unhandled rejections.
        apply(then, promise, [undefined, ignore])
        calls[calls.length] = call
        return promise
    }

    pin(globalThis, 'mcp', { value: freeze({ callTool: freeze(callTool) }), enumerable: true })

    const run = async function run(solve, done) {
        try {
            done(true, await solve())
        } catch (error) {
            done(false, describe(error))
        }
    }

    const unobservedFailure = function unobservedFailure() {
        for (let i = 0; i < calls.length; i++) {
            if (calls[i].error !== undefined && !calls[i].observed) return calls[i].error
        }
        return undefined
    }

    return { run, unobservedFailure }
})`

const installScript = new vm.Script(INSTALL_SOURCE, { filename: 'sandbox-install.js' })

interface BridgeReply {
    ok: boolean
    text: string
}

type Settled = { ok: true; value: unknown } | { ok: false; message: string }

function callable(value: unknown, what: string): (...args: unknown[]) => unknown {
    if (typeof value !== 'function') throw new PlanExecutionError(`Sandbox ${what} is not a function`)
    const target = value
    return (...args) => Reflect.apply(target, undefined, args)
}

function tick(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve))
}

/**
 * Runs planner-written code that defines `solve` in a fresh V8 context.
 *
 * The context sees the language intrinsics and a single `mcp` object whose
 * `callTool` proxies to the Dispatcher under a per-plan call budget. No host
 * object or function is reachable from plan code, and string code generation
 * is disabled. Calls still in flight when `solve` settles are awaited, and a
 * failed call the plan never awaited fails the plan. CPU and memory are not
 * limited.
 */
export class SandboxExecutor {
    constructor(
        private logger: Logger,
        private defaultMaxToolCalls = DEFAULT_MAX_TOOL_CALLS
    ) {}

    async run(code: string, tools: ToolCaller): Promise<string> {
        const outcome = await this.execute(code, tools)
        return outcome.output
    }

    async execute(code: string, tools: ToolCaller, options: ExecuteOptions = {}): Promise<ExecutionOutcome> {
        const limit = options.maxToolCalls ?? this.defaultMaxToolCalls
        const calls: ToolCallRecord[] = []
        const inFlight = new Set<Promise<BridgeReply>>()
        let callCount = 0
        const budget: { exhausted?: PlanResourceExhaustedError } = {}

        const record = (entry: ToolCallRecord): void => {
            calls.push(entry)
            options.onToolCall?.(entry)
        }

        const invoke = async (name: unknown, argsJson: unknown): Promise<BridgeReply> => {
            callCount++
            if (callCount > limit) {
                budget.exhausted = new PlanResourceExhaustedError(limit)
                return { ok: false, text: budget.exhausted.message }
            }
            if (typeof name !== 'string') {
                return { ok: false, text: 'Tool name must be a string' }
            }
            const parsed: unknown = typeof argsJson === 'string' ? JSON.parse(argsJson) : {}
            if (!isRecord(parsed)) {
                return { ok: false, text: `Arguments for tool '${name}' must be an object` }
            }
            options.onToolStart?.(name)
            const started = Date.now()

            try {
                const payload = await tools.callTool(name, parsed)
                this.logger.debug({ tool: name, preview: previewOf(payload) }, 'sandbox:tool')
                record({
                    toolName: name,
                    arguments: parsed,
                    result: payload,
                    success: payload.success,
                    timestamp: new Date().toISOString(),
                    duration: Date.now() - started,
                })
                return { ok: true, text: JSON.stringify(payload) }
            } catch (error) {
                const message = describe(error)
                record({
                    toolName: name,
                    arguments: parsed,
                    result: null,
                    success: false,
                    timestamp: new Date().toISOString(),
                    duration: Date.now() - started,
                    error: message,
                })
                return { ok: false, text: message }
            }
        }

        // Called from inside the context; it must never throw a host error there.
        const bridge = (name: unknown, argsJson: unknown, respond: unknown): void => {
            if (typeof respond !== 'function') return
            const reply = respond
            const pending = invoke(name, argsJson).catch((error: unknown): BridgeReply => ({ ok: false, text: describe(error) }))
            inFlight.add(pending)
            pending
                .then((result) => {
                    inFlight.delete(pending)
                    Reflect.apply(reply, undefined, [result.ok, result.text])
                })
                .catch((error: unknown) => {
                    this.logger.error({ error: describe(error) }, 'sandbox:reply failed')
                })
        }

        const fail = (message: string): ExecutionOutcome => {
            this.logger.warn({ error: message, calls: calls.length }, 'sandbox:error')
            return { status: 'error', error: message, output: sandboxErrorText(message), calls }
        }

        let settled: Settled
        let unobservedFailure: () => unknown = () => undefined
        try {
            const context = vm.createContext({}, { name: 'solve-plan', codeGeneration: { strings: false, wasm: false } })
            const hooks: unknown = callable(installScript.runInContext(context), 'installer')(bridge)
            if (!isRecord(hooks)) throw new PlanExecutionError('Sandbox installer returned no hooks')
            const runner = callable(hooks.run, 'runner')
            unobservedFailure = callable(hooks.unobservedFailure, 'failure check')

            const script = new vm.Script(`${code}\n;(typeof solve === 'function' ? solve : undefined)`, {
                filename: 'solve-plan.js',
            })
            const solve: unknown = script.runInContext(context)
            if (typeof solve !== 'function') {
                settled = { ok: false, message: 'No solve() function found in plan.' }
            } else {
                settled = await new Promise<Settled>((resolve) => {
                    runner(solve, (ok: unknown, value: unknown) => {
                        resolve(ok === true ? { ok: true, value } : { ok: false, message: String(value) })
                    })
                })
            }
        } catch (error) {
            settled = { ok: false, message: describe(error) }
        }

        await this.drain(inFlight)

        // A plan may swallow the budget error itself; it still fails.
        if (budget.exhausted) return fail(budget.exhausted.message)
        if (!settled.ok) return fail(settled.message)

        const unobserved = unobservedFailure()
        if (typeof unobserved === 'string') return fail(unobserved)

        try {
            return { status: 'success', output: normalizeResult(settled.value), calls }
        } catch (error) {
            return fail(describe(error))
        }
    }

    // Plan code can only progress through microtasks and tool replies, so once a
    // macrotask passes with nothing in flight the plan is finished.
    private async drain(inFlight: Set<Promise<BridgeReply>>): Promise<void> {
        for (;;) {
            await tick()
            if (inFlight.size === 0) return
            this.logger.debug({ pending: inFlight.size }, 'sandbox:awaiting unawaited calls')
            await Promise.all(inFlight)
        }
    }
}
