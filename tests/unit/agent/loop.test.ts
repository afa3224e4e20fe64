import pino from 'pino'
import { describe, expect, it } from 'vitest'
import { SessionContext } from '../../../src/agent/context.js'
import { AgentLoop, continuationInput } from '../../../src/agent/loop.js'
import type { StrategyProfile } from '../../../src/config/schema.js'
import { TypedEventEmitter, type EventMap } from '../../../src/core/events.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { Dispatcher } from '../../../src/mcp/dispatcher.js'
import type { PlanDraft } from '../../../src/planner/types.js'
import { SandboxExecutor } from '../../../src/sandbox/executor.js'
import { descriptor, FakeServerConnector, text } from '../../helpers/fake-connector.js'
import { code, perception, ScriptedPlanner } from '../../helpers/scripted-planner.js'

const mockLogger = pino({ level: 'silent' })

const baseProfile: StrategyProfile = {
    planningMode: 'conservative',
    memoryFallbackEnabled: false,
    maxSteps: 3,
    maxLifelinesPerStep: 0,
}

async function setup(
    planner: ScriptedPlanner,
    options: { profile?: Partial<StrategyProfile>; failuresBeforeSuccess?: number } = {}
) {
    let failures = options.failuresBeforeSuccess ?? 0
    const connector = new FakeServerConnector({
        math: {
            tools: {
                factorial: () => text('120'),
                add: () => text('4'),
                flaky: () => {
                    if (failures > 0) {
                        failures--
                        throw new Error('connection reset')
                    }
                    return text('ok')
                },
                broken: () => {
                    throw new Error('server crashed')
                },
            },
        },
        docs: { tools: { lookup: () => text('doc') } },
    })
    const dispatcher = new Dispatcher([descriptor('math'), descriptor('docs')], mockLogger, connector)
    await dispatcher.initialize()

    const events = new TypedEventEmitter()
    const stepEnds: Array<EventMap['step:end']> = []
    events.on('step:end', (e) => stepEnds.push(e))

    const fs = new MockFileSystem()
    const loop = new AgentLoop({
        planner,
        dispatcher,
        executor: new SandboxExecutor(mockLogger),
        profile: { ...baseProfile, ...options.profile },
        maxToolCalls: 5,
        logger: mockLogger,
        events,
    })
    const ctx = await SessionContext.create('factorial of 5', { fs, sessionsDir: '/s' })
    return { loop, ctx, fs, stepEnds }
}

function lastItem(ctx: SessionContext) {
    const items = ctx.memory.getItems()
    return items[items.length - 1]
}

const finalFromFactorial = code(`async function solve() {
    const r = await mcp.callTool('factorial', { n: 5 })
    return 'FINAL_ANSWER: ' + r.content[0].text
}`)

describe('AgentLoop', () => {
    it('answers in one step and records the tool call and final answer', async () => {
        const planner = new ScriptedPlanner([finalFromFactorial], (r) =>
            perception({ userInput: r.userInput, toolHint: 'factorial', selectedServers: ['math'] })
        )
        const { loop, ctx } = await setup(planner)

        const outcome = await loop.run(ctx)

        expect(outcome).toEqual({ status: 'final', answer: '120', bestEffort: false, steps: 1 })
        expect(ctx.finalAnswer).toBe('120')
        expect(planner.planRequests[0]?.toolDescriptions).toBe('- factorial: factorial on math')
        expect(ctx.memory.getItems().map((i) => i.type)).toEqual(['run_metadata', 'tool_output', 'final_answer'])
        expect(lastItem(ctx)).toMatchObject({ text: '120', success: true, tags: [], user_query: 'factorial of 5' })
        expect(ctx.taskProgress).toEqual([{ step: 1, tool: 'factorial', status: 'success' }])
    })

    it('stops after maxSteps when every step asks for more processing', async () => {
        const planner = new ScriptedPlanner([code("function solve() { return 'FURTHER_PROCESSING_REQUIRED: partial' }")])
        const { loop, ctx } = await setup(planner)

        const outcome = await loop.run(ctx)

        expect(outcome).toEqual({ status: 'incomplete', lastText: 'partial', steps: 3 })
        expect(planner.planRequests).toHaveLength(3)
        expect(planner.perceiveRequests.map((r) => r.userInput)).toEqual([
            'factorial of 5',
            continuationInput('factorial of 5', 'partial'),
            continuationInput('factorial of 5', 'partial'),
        ])
        expect(ctx.finalAnswer).toBeUndefined()
        expect(lastItem(ctx)).toMatchObject({ type: 'note', tags: ['incomplete'] })
    })

    it('reruns the same code on a lifeline without spending a step', async () => {
        const planner = new ScriptedPlanner([
            code("async function solve() { const r = await mcp.callTool('flaky', {}); return 'FINAL_ANSWER: ' + r.content[0].text }"),
        ])
        const { loop, ctx, stepEnds } = await setup(planner, {
            profile: { maxLifelinesPerStep: 2 },
            failuresBeforeSuccess: 1,
        })

        const outcome = await loop.run(ctx)

        expect(outcome).toEqual({ status: 'final', answer: 'ok', bestEffort: false, steps: 1 })
        expect(planner.planRequests).toHaveLength(1)
        expect(stepEnds).toEqual([{ sessionId: ctx.sessionId, step: 1, success: true, attempts: 2 }])
        const toolOutputs = ctx.memory.getItems().filter((i) => i.type === 'tool_output')
        expect(toolOutputs.map((i) => i.success)).toEqual([false, true])
    })

    it('forces a replan over every tool after a failed step, reusing the perception', async () => {
        const planner = new ScriptedPlanner(
            [code("async function solve() { return await mcp.callTool('broken', {}) }"), finalFromFactorial],
            (r) => perception({ userInput: r.userInput, toolHint: 'broken', selectedServers: ['math'] })
        )
        const { loop, ctx } = await setup(planner)

        const outcome = await loop.run(ctx)

        expect(outcome).toEqual({ status: 'final', answer: '120', bestEffort: false, steps: 2 })
        expect(planner.perceiveRequests).toHaveLength(1)
        expect(planner.planRequests[0]?.toolDescriptions).toBe('- broken: broken on math')
        expect(planner.planRequests[1]?.toolDescriptions).toBe(
            [
                '- factorial: factorial on math',
                '- add: add on math',
                '- flaky: flaky on math',
                '- broken: broken on math',
                '- lookup: lookup on docs',
            ].join('\n')
        )
    })

    it('gives a best-effort answer when the forced replan fails too', async () => {
        const planner = new ScriptedPlanner([code("async function solve() { return await mcp.callTool('broken', {}) }")])
        const { loop, ctx } = await setup(planner)

        const outcome = await loop.run(ctx)

        expect(outcome).toEqual({
            status: 'final',
            answer: "[sandbox error: Tool 'broken' on server 'math' failed: server crashed]",
            bestEffort: true,
            steps: 2,
        })
        expect(lastItem(ctx)).toMatchObject({ type: 'final_answer', success: false, tags: ['best_effort'] })
    })

    it('treats output without a marker as a best-effort answer', async () => {
        const { loop, ctx } = await setup(new ScriptedPlanner([code("function solve() { return '  just text ' }")]))
        expect(await loop.run(ctx)).toEqual({ status: 'final', answer: 'just text', bestEffort: true, steps: 1 })
    })

    it('finishes with the planner text when no valid plan came back', async () => {
        const draft: PlanDraft = { kind: 'answer', text: 'FINAL_ANSWER: [Could not generate valid solve()]' }
        const { loop, ctx, stepEnds } = await setup(new ScriptedPlanner([draft]))

        expect(await loop.run(ctx)).toEqual({
            status: 'final',
            answer: '[Could not generate valid solve()]',
            bestEffort: true,
            steps: 1,
        })
        expect(stepEnds[0]?.attempts).toBe(0)
    })

    it('falls back to every server when perception fails', async () => {
        const planner = new ScriptedPlanner([finalFromFactorial], () => new Error('model unavailable'))
        const { loop, ctx } = await setup(planner)

        await loop.run(ctx)

        expect(planner.planRequests[0]?.perception.selectedServers).toEqual(['math', 'docs'])
    })

    it('offers recently successful tools first on a forced replan with memory fallback', async () => {
        const planner = new ScriptedPlanner([
            code("async function solve() { await mcp.callTool('add', {}); return 'FURTHER_PROCESSING_REQUIRED: 4' }"),
            code("async function solve() { return await mcp.callTool('broken', {}) }"),
            code("function solve() { return 'FINAL_ANSWER: 4' }"),
        ])
        const { loop, ctx } = await setup(planner, {
            profile: { planningMode: 'exploratory', explorationMode: 'sequential', memoryFallbackEnabled: true },
        })

        const outcome = await loop.run(ctx)

        expect(outcome).toEqual({ status: 'final', answer: '4', bestEffort: false, steps: 3 })
        expect(planner.planRequests[2]?.toolDescriptions).toBe('- add: add on math')
        expect(planner.planRequests[2]?.memoryTexts).toEqual([
            "Tool 'add' succeeded. Result: {\"content\":[{\"text\":\"4\"}],\"success\":true}",
            'Tool \'broken\' failed. Result: {"error":"Tool \'broken\' on server \'math\' failed: server crashed"}',
        ])
    })

    it('ends incomplete without running a step when already aborted', async () => {
        const planner = new ScriptedPlanner([finalFromFactorial])
        const { loop, ctx } = await setup(planner)
        const controller = new AbortController()
        controller.abort()

        expect(await loop.run(ctx, controller.signal)).toEqual({ status: 'incomplete', lastText: '', steps: 0 })
        expect(planner.planRequests).toHaveLength(0)
    })
})
