import pino from 'pino'
import { describe, expect, it, vi } from 'vitest'
import type { ToolCallPayload, ToolCallRecord } from '../../../src/mcp/types.js'
import { isSandboxError, normalizeResult, SandboxExecutor, type ToolCaller } from '../../../src/sandbox/executor.js'
import { text } from '../../helpers/fake-connector.js'

const mockLogger = pino({ level: 'silent' })

function tools(handler: (name: string, args: Record<string, unknown>) => ToolCallPayload = () => text('1')) {
    const calls: Array<{ name: string; args: Record<string, unknown> }> = []
    const caller: ToolCaller = {
        async callTool(name, args) {
            calls.push({ name, args })
            return handler(name, args)
        },
    }
    return { caller, calls }
}

describe('SandboxExecutor', () => {
    const executor = new SandboxExecutor(mockLogger)

    it('runs an async solve and returns its string result', async () => {
        const { caller, calls } = tools(() => text('120'))
        const code = `async function solve() {
    const r = await mcp.callTool('factorial', { n: 5 })
    return 'FINAL_ANSWER: ' + r.content[0].text
}`
        expect(await executor.run(code, caller)).toBe('FINAL_ANSWER: 120')
        expect(calls).toEqual([{ name: 'factorial', args: { n: 5 } }])
    })

    it('accepts a synchronous solve bound with const', async () => {
        const { caller } = tools()
        expect(await executor.run('const solve = () => 42', caller)).toBe('42')
    })

    it('fails when no solve is defined', async () => {
        const { caller } = tools()
        expect(await executor.run('function other() { return 1 }', caller)).toBe(
            '[sandbox error: No solve() function found in plan.]'
        )
    })

    it('turns syntax errors into a sentinel', async () => {
        const { caller } = tools()
        const output = await executor.run('async function solve( {', caller)
        expect(isSandboxError(output)).toBe(true)
    })

    it('turns thrown errors into a sentinel with their message', async () => {
        const { caller } = tools()
        expect(await executor.run("function solve() { throw new Error('boom') }", caller)).toBe('[sandbox error: boom]')
    })

    it('allows exactly the ceiling of tool calls', async () => {
        const { caller, calls } = tools()
        const code = `async function solve() {
    for (let i = 0; i < 5; i++) await mcp.callTool('add', { a: i, b: 1 })
    return 'FINAL_ANSWER: done'
}`
        expect(await executor.run(code, caller)).toBe('FINAL_ANSWER: done')
        expect(calls).toHaveLength(5)
    })

    it('fails the plan on the call past the ceiling without executing it', async () => {
        const { caller, calls } = tools()
        const code = `async function solve() {
    for (let i = 0; i < 6; i++) await mcp.callTool('add', { a: i, b: 1 })
    return 'FINAL_ANSWER: done'
}`
        expect(await executor.run(code, caller)).toBe('[sandbox error: Exceeded max tool calls (5) in solve() plan.]')
        expect(calls).toHaveLength(5)
    })

    it('still fails when the plan catches the budget error', async () => {
        const { caller, calls } = tools()
        const code = `async function solve() {
    try {
        for (let i = 0; i < 3; i++) await mcp.callTool('add', {})
    } catch (e) {
        return 'FINAL_ANSWER: swallowed'
    }
    return 'FINAL_ANSWER: unreachable'
}`
        const outcome = await executor.execute(code, caller, { maxToolCalls: 2 })
        expect(outcome.status).toBe('error')
        expect(outcome.output).toBe('[sandbox error: Exceeded max tool calls (2) in solve() plan.]')
        expect(calls).toHaveLength(2)
    })

    it('reports tool failures as sentinels and records them', async () => {
        const caller: ToolCaller = {
            callTool: async () => {
                throw new Error("Tool 'ghost' not found on any server.")
            },
        }
        const outcome = await executor.execute("async function solve() { return await mcp.callTool('ghost', {}) }", caller)
        expect(outcome).toMatchObject({
            status: 'error',
            output: "[sandbox error: Tool 'ghost' not found on any server.]",
        })
        expect(outcome.calls).toHaveLength(1)
        expect(outcome.calls[0]).toMatchObject({ toolName: 'ghost', success: false, result: null })
    })

    it('hides host capabilities from the plan', async () => {
        const { caller } = tools()
        const code = `function solve() {
    return [typeof require, typeof process, typeof fetch, typeof setTimeout]
}`
        expect(await executor.run(code, caller)).toBe('undefined undefined undefined undefined')
    })

    it('keeps host constructors out of reach', async () => {
        const { caller } = tools(() => text('7'))
        const viaProxy = "function solve() { return typeof mcp.callTool.constructor('return process')().pid }"
        const viaPayload = `async function solve() {
    const r = await mcp.callTool('add', {})
    return typeof r.content.constructor.constructor('return process')().pid
}`
        expect(isSandboxError(await executor.run(viaProxy, caller))).toBe(true)
        expect(isSandboxError(await executor.run(viaPayload, caller))).toBe(true)
    })

    it('keeps host constructors out of reach through tool errors', async () => {
        const caller: ToolCaller = {
            callTool: async () => {
                throw new Error('server exited')
            },
        }
        const code = `async function solve() {
    try {
        await mcp.callTool('add', {})
    } catch (e) {
        return typeof e.constructor.constructor('return process')().pid
    }
}`
        expect(isSandboxError(await executor.run(code, caller))).toBe(true)
    })

    it('fails the plan when an un-awaited call fails', async () => {
        const caller: ToolCaller = {
            callTool: async () => {
                throw new Error("Tool 'ghost' not found on any server.")
            },
        }
        const unhandled = vi.fn()
        process.on('unhandledRejection', unhandled)
        try {
            const output = await executor.run(
                "function solve() { mcp.callTool('ghost', {}); return 'FINAL_ANSWER: done' }",
                caller
            )
            await new Promise((resolve) => setImmediate(resolve))
            expect(output).toBe("[sandbox error: Tool 'ghost' not found on any server.]")
            expect(unhandled).not.toHaveBeenCalled()
        } finally {
            process.off('unhandledRejection', unhandled)
        }
    })

    it('waits for un-awaited calls before returning', async () => {
        let finished = false
        const caller: ToolCaller = {
            callTool: async () => {
                await new Promise((resolve) => setTimeout(resolve, 20))
                finished = true
                return text('ok')
            },
        }
        const outcome = await executor.execute(
            "function solve() { mcp.callTool('slow', {}); return 'FINAL_ANSWER: started' }",
            caller
        )
        expect(outcome.status).toBe('success')
        expect(outcome.output).toBe('FINAL_ANSWER: started')
        expect(finished).toBe(true)
        expect(outcome.calls).toHaveLength(1)
    })

    it('blocks string code generation', async () => {
        const { caller } = tools()
        const output = await executor.run("function solve() { return eval('1 + 1') }", caller)
        expect(isSandboxError(output)).toBe(true)
    })

    it('rejects non-object tool arguments', async () => {
        const { caller, calls } = tools()
        expect(await executor.run("async function solve() { return mcp.callTool('add', 5) }", caller)).toBe(
            "[sandbox error: Arguments for tool 'add' must be an object]"
        )
        expect(calls).toHaveLength(0)
    })

    it('notifies observers of every call in program order', async () => {
        const { caller } = tools((name) => text(name === 'fail' ? 'no' : 'yes', name !== 'fail'))
        const onToolStart = vi.fn()
        const records: ToolCallRecord[] = []
        const code = `async function solve() {
    await mcp.callTool('first', { x: 1 })
    await mcp.callTool('fail', {})
    return { result: 'ok' }
}`
        const outcome = await executor.execute(code, caller, { onToolStart, onToolCall: (r) => records.push(r) })

        expect(outcome.status).toBe('success')
        expect(onToolStart.mock.calls).toEqual([['first'], ['fail']])
        expect(records.map((r) => [r.toolName, r.success])).toEqual([
            ['first', true],
            ['fail', false],
        ])
        expect(outcome.calls).toEqual(records)
    })
})

describe('normalizeResult', () => {
    it('unwraps the result key', () => {
        expect(normalizeResult({ result: 'FINAL_ANSWER: 7' })).toBe('FINAL_ANSWER: 7')
        expect(normalizeResult({ result: 120 })).toBe('120')
        expect(normalizeResult({ result: [1, 2] })).toBe('[1,2]')
    })

    it('encodes other objects as JSON', () => {
        expect(normalizeResult({ a: 1, b: 'x' })).toBe('{"a":1,"b":"x"}')
    })

    it('joins arrays with single spaces', () => {
        expect(normalizeResult(['FINAL_ANSWER:', 3, { k: 1 }])).toBe('FINAL_ANSWER: 3 {"k":1}')
    })

    it('stringifies everything else', () => {
        expect(normalizeResult(7)).toBe('7')
        expect(normalizeResult(null)).toBe('null')
        expect(normalizeResult(undefined)).toBe('undefined')
    })
})
