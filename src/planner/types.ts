import { z } from 'zod'
import type { ExplorationMode, PlanningMode } from '../config/schema.js'
import type { ServerSummary } from '../mcp/types.js'

export const PerceptionReplySchema = z.object({
    intent: z.string().describe('What the user wants, in one short phrase'),
    entities: z.array(z.string()).default([]).describe('Key values and names mentioned in the request'),
    tool_hint: z
        .string()
        .nullish()
        .transform((v) => v ?? '')
        .describe('Name of the tool most likely to help, or empty'),
    selected_servers: z.array(z.string()).default([]).describe('Ids of the servers relevant to the request'),
})

export type PerceptionReply = z.infer<typeof PerceptionReplySchema>

export interface Perception {
    userInput: string
    intent: string
    entities: string[]
    toolHint: string
    selectedServers: string[]
}

export interface PerceiveRequest {
    userInput: string
    servers: ServerSummary[]
    signal?: AbortSignal
}

export interface PlanRequest {
    userInput: string
    perception: Perception
    toolDescriptions: string
    memoryTexts: string[]
    step: number
    maxSteps: number
    planningMode: PlanningMode
    explorationMode?: ExplorationMode
    signal?: AbortSignal
}

/** Either code defining `solve`, or text to evaluate directly when no usable code came back. */
export type PlanDraft = { kind: 'code'; code: string } | { kind: 'answer'; text: string }

export interface Planner {
    perceive(request: PerceiveRequest): Promise<Perception>
    plan(request: PlanRequest): Promise<PlanDraft>
}
