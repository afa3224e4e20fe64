import type { StrategyProfile } from '../config/schema.js'
import { errorMessage, isAbortError, PerceptionParseError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import type { ServerSummary, ToolCallRecord } from '../mcp/types.js'
import { defaultPerception } from '../planner/perception.js'
import { summarizeTools } from '../planner/tools.js'
import type { Perception, PlanDraft, Planner } from '../planner/types.js'
import type { SandboxExecutor, ToolCaller } from '../sandbox/executor.js'
import type { SessionContext } from './context.js'
import { evaluateOutput } from './evaluate.js'
import { selectTools, type ToolCatalogue } from './strategy.js'

export interface ToolRouter extends ToolCatalogue, ToolCaller {
    getServerDescriptions(): ServerSummary[]
}

export interface AgentLoopOptions {
    planner: Planner
    dispatcher: ToolRouter
    executor: SandboxExecutor
    profile: StrategyProfile
    maxToolCalls: number
    logger: Logger
    events?: TypedEventEmitter
}

export type LoopOutcome =
    | { status: 'final'; answer: string; bestEffort: boolean; steps: number }
    | { status: 'incomplete'; lastText: string; steps: number }

interface StepResult {
    ok: boolean
    output: string
    /** True when the text came from the planner directly instead of a successful run. */
    fallback: boolean
    attempts: number
}

export function continuationInput(originalTask: string, remainder: string): string {
    return (
        `Original user task: ${originalTask}\n\n` +
        `Your last tool produced this result:\n\n${remainder}\n\n` +
        'If this fully answers the task, return FINAL_ANSWER: followed by the answer. ' +
        'Otherwise plan the next tool call.'
    )
}

/**
 * PERCEIVE, PLAN, EXECUTE, EVALUATE until a final answer or `maxSteps`.
 *
 * A step is one PLAN+EXECUTE. Inside a step the same code may run again up to
 * `maxLifelinesPerStep` times; those reruns do not count as steps. A step
 * whose runs all fail is followed by a forced replan over the full tool
 * catalogue, and a forced replan that fails too ends the session with the
 * last error as a best-effort answer.
 */
export class AgentLoop {
    constructor(private options: AgentLoopOptions) {}

    async run(ctx: SessionContext, signal?: AbortSignal): Promise<LoopOutcome> {
        const { profile, logger, events } = this.options
        const servers = this.options.dispatcher.getServerDescriptions()

        events?.emit('session:start', { sessionId: ctx.sessionId, input: ctx.query })
        logger.info({ sessionId: ctx.sessionId, maxSteps: profile.maxSteps }, 'session:start')

        let input = ctx.userInput
        let perception: Perception | undefined
        let forcedReplan = false
        let lastText = ''

        try {
            while (ctx.step < profile.maxSteps) {
                if (signal?.aborted) {
                    logger.info({ sessionId: ctx.sessionId, step: ctx.step }, 'session:aborted')
                    break
                }

                // A forced replan keeps the previous perception and input.
                if (!forcedReplan || !perception) {
                    perception = await this.perceive(input, servers, signal)
                }

                const step = ctx.advanceStep()
                events?.emit('step:start', { sessionId: ctx.sessionId, step, forcedReplan })

                const draft = await this.plan(ctx, input, perception, forcedReplan, signal)
                const result = await this.execute(ctx, draft)

                events?.emit('step:end', {
                    sessionId: ctx.sessionId,
                    step,
                    success: result.ok,
                    attempts: result.attempts,
                })
                lastText = result.output

                if (!result.ok) {
                    if (forcedReplan) {
                        logger.warn({ sessionId: ctx.sessionId, step }, 'Forced replan failed, giving best-effort answer')
                        return await this.finish(ctx, result.output, true)
                    }
                    logger.warn({ sessionId: ctx.sessionId, step, attempts: result.attempts }, 'Step failed, forcing replan')
                    forcedReplan = true
                    continue
                }
                forcedReplan = false

                const evaluation = evaluateOutput(result.output)
                lastText = evaluation.text
                switch (evaluation.kind) {
                    case 'final':
                        return await this.finish(ctx, evaluation.text, result.fallback)
                    case 'continue':
                        input = continuationInput(ctx.query, evaluation.text)
                        break
                    case 'other':
                        return await this.finish(ctx, evaluation.text, true)
                }
            }
        } catch (error) {
            if (!isAbortError(error)) throw error
            logger.info({ sessionId: ctx.sessionId, step: ctx.step }, 'session:aborted')
        }

        await ctx.memory.add({
            timestamp: Date.now() / 1000,
            type: 'note',
            text: `Session ended without a final answer after ${ctx.step} steps. Last output: ${lastText}`,
            session_id: ctx.sessionId,
            tags: ['incomplete'],
            user_query: ctx.query,
        })
        events?.emit('session:end', { sessionId: ctx.sessionId, status: 'incomplete', steps: ctx.step })
        logger.info({ sessionId: ctx.sessionId, steps: ctx.step }, 'session:incomplete')
        return { status: 'incomplete', lastText, steps: ctx.step }
    }

    private async perceive(input: string, servers: ServerSummary[], signal?: AbortSignal): Promise<Perception> {
        try {
            return await this.options.planner.perceive({ userInput: input, servers, signal })
        } catch (error) {
            if (isAbortError(error)) throw error
            const level = error instanceof PerceptionParseError ? 'warn' : 'error'
            this.options.logger[level]({ error: errorMessage(error) }, 'Perception failed, using all servers')
            return defaultPerception(
                input,
                servers.map((s) => s.id)
            )
        }
    }

    private async plan(
        ctx: SessionContext,
        input: string,
        perception: Perception,
        forcedReplan: boolean,
        signal?: AbortSignal
    ): Promise<PlanDraft> {
        const { profile, dispatcher, logger, planner } = this.options
        const items = ctx.memory.getItems()
        const selection = selectTools({
            perception,
            forcedReplan,
            profile,
            catalogue: dispatcher,
            memoryItems: items,
        })
        logger.debug(
            { step: ctx.step, source: selection.source, tools: selection.tools.map((t) => t.name) },
            'strategy:tools'
        )

        return planner.plan({
            userInput: input,
            perception,
            toolDescriptions: summarizeTools(selection.tools),
            memoryTexts: items.filter((i) => i.type === 'tool_output').map((i) => i.text),
            step: ctx.step,
            maxSteps: profile.maxSteps,
            planningMode: profile.planningMode,
            explorationMode: profile.explorationMode,
            signal,
        })
    }

    private async execute(ctx: SessionContext, draft: PlanDraft): Promise<StepResult> {
        if (draft.kind === 'answer') {
            return { ok: true, output: draft.text, fallback: true, attempts: 0 }
        }

        const { executor, dispatcher, profile, maxToolCalls, events, logger } = this.options
        const maxAttempts = 1 + profile.maxLifelinesPerStep
        let output = ''

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            const outcome = await executor.execute(draft.code, dispatcher, {
                maxToolCalls,
                onToolStart: (name) => ctx.logSubtask(name),
                onToolCall: (record) => {
                    ctx.updateSubtaskStatus(record.toolName, record.success ? 'success' : 'failure')
                    events?.emit('tool:after', {
                        sessionId: ctx.sessionId,
                        toolName: record.toolName,
                        success: record.success,
                        duration: record.duration,
                    })
                },
            })

            for (const record of outcome.calls) {
                await this.logToolCall(ctx, record)
            }

            output = outcome.output
            if (outcome.status === 'success') {
                return { ok: true, output, fallback: false, attempts: attempt }
            }
            if (attempt < maxAttempts) {
                logger.info({ step: ctx.step, attempt, error: outcome.error }, 'Execution failed, using a lifeline')
            }
        }

        return { ok: false, output, fallback: false, attempts: maxAttempts }
    }

    private async logToolCall(ctx: SessionContext, record: ToolCallRecord): Promise<void> {
        const result = record.result ?? { error: record.error ?? 'unknown error' }
        await ctx.memory.addToolOutput(record.toolName, record.arguments, result, record.success, [`step:${ctx.step}`])
    }

    private async finish(ctx: SessionContext, answer: string, bestEffort: boolean): Promise<LoopOutcome> {
        ctx.setFinalAnswer(answer)
        await ctx.memory.add({
            timestamp: Date.now() / 1000,
            type: 'final_answer',
            text: answer,
            session_id: ctx.sessionId,
            tags: bestEffort ? ['best_effort'] : [],
            success: !bestEffort,
            user_query: ctx.query,
        })
        this.options.events?.emit('session:end', { sessionId: ctx.sessionId, status: 'final', steps: ctx.step })
        this.options.logger.info({ sessionId: ctx.sessionId, steps: ctx.step, bestEffort }, 'session:final')
        return { status: 'final', answer, bestEffort, steps: ctx.step }
    }
}
