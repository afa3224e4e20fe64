import { zodToJsonSchema } from 'zod-to-json-schema'
import { errorMessage, isAbortError } from '../core/errors.js'
import type { LLMClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import { extractPlan, planningFailedAnswer } from './decision.js'
import { parsePerception } from './perception.js'
import { fillTemplate, PERCEPTION_PROMPT, selectPlanPrompt } from './prompts.js'
import { type PerceiveRequest, type Perception, PerceptionReplySchema, type PlanDraft, type PlanRequest, type Planner } from './types.js'

const PERCEPTION_SCHEMA_TEXT = JSON.stringify(
    zodToJsonSchema(PerceptionReplySchema, { $refStrategy: 'none' }),
    null,
    2
)

export interface LlmPlannerOptions {
    perceptionTemperature?: number
    planTemperature?: number
}

/** Planner backed by a chat model: one completion for perception, one per plan. */
export class LlmPlanner implements Planner {
    constructor(
        private llm: LLMClient,
        private logger: Logger,
        private options: LlmPlannerOptions = {}
    ) {}

    async perceive(request: PerceiveRequest): Promise<Perception> {
        const prompt = fillTemplate(PERCEPTION_PROMPT, {
            server_descriptions: request.servers.map((s) => `- ${s.id}: ${s.description}`).join('\n'),
            user_input: request.userInput,
            response_schema: PERCEPTION_SCHEMA_TEXT,
        })

        const response = await this.llm.chat({
            messages: [{ role: 'user', content: prompt }],
            temperature: this.options.perceptionTemperature,
            signal: request.signal,
        })
        this.logger.debug({ raw: response.content }, 'planner:perception')

        return parsePerception(response.content, request.userInput)
    }

    async plan(request: PlanRequest): Promise<PlanDraft> {
        const template = selectPlanPrompt(request.planningMode, request.explorationMode)
        const memoryTexts = request.memoryTexts.map((t) => `- ${t}`).join('\n') || 'None'
        const prompt = fillTemplate(template, {
            tool_descriptions: request.toolDescriptions || 'None',
            user_input: request.userInput,
            memory_texts: memoryTexts,
            step_num: String(request.step),
            max_steps: String(request.maxSteps),
        })

        let raw: string
        try {
            const response = await this.llm.chat({
                messages: [{ role: 'user', content: prompt }],
                temperature: this.options.planTemperature,
                signal: request.signal,
            })
            raw = response.content
        } catch (error) {
            if (isAbortError(error)) throw error
            this.logger.warn({ error: errorMessage(error) }, 'planner:failed')
            return { kind: 'answer', text: planningFailedAnswer(errorMessage(error)) }
        }

        this.logger.debug({ raw }, 'planner:plan')
        const draft = extractPlan(raw)
        if (draft.kind === 'answer') {
            this.logger.warn('Planner reply did not define solve()')
        }
        return draft
    }
}
