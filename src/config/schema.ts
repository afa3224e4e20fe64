import { z } from 'zod'

export const ServerDescriptorSchema = z
    .object({
        id: z.string().min(1),
        command: z.string().optional(),
        script: z.string().optional(),
        args: z.array(z.string()).optional(),
        cwd: z.string().optional(),
        env: z.record(z.string()).optional(),
        description: z.string().default(''),
    })
    .refine((data) => data.command || data.script, { message: 'Server must have either command or script' })

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const PlanningModeSchema = z.enum(['conservative', 'exploratory'])
export const ExplorationModeSchema = z.enum(['parallel', 'sequential'])

export const ConfigSchema = z.object({
    model: z.string().optional(),
    apiKey: z.string().optional(),
    baseURL: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().positive().optional(),
    logLevel: LogLevelSchema.optional(),
    embedding: z
        .object({
            model: z.string().optional(),
            baseURL: z.string().optional(),
            apiKey: z.string().optional(),
        })
        .optional(),
    servers: z.array(ServerDescriptorSchema).optional(),
    strategy: z
        .object({
            planningMode: PlanningModeSchema.optional(),
            explorationMode: ExplorationModeSchema.optional(),
            memoryFallbackEnabled: z.boolean().optional(),
            maxSteps: z.number().int().positive().optional(),
            maxLifelinesPerStep: z.number().int().nonnegative().optional(),
        })
        .optional(),
    sandbox: z
        .object({
            maxToolCalls: z.number().int().positive().optional(),
        })
        .optional(),
    memory: z
        .object({
            enabled: z.boolean().optional(),
            sessionsDir: z.string().optional(),
            indexDir: z.string().optional(),
            maxResults: z.number().int().positive().optional(),
            distanceThreshold: z.number().positive().optional(),
        })
        .optional(),
})

export type Config = z.infer<typeof ConfigSchema>
export type ServerDescriptor = z.infer<typeof ServerDescriptorSchema>
export type LogLevel = z.infer<typeof LogLevelSchema>
export type PlanningMode = z.infer<typeof PlanningModeSchema>
export type ExplorationMode = z.infer<typeof ExplorationModeSchema>

export interface StrategyProfile {
    planningMode: PlanningMode
    explorationMode?: ExplorationMode
    memoryFallbackEnabled: boolean
    maxSteps: number
    maxLifelinesPerStep: number
}

export interface MemoryConfig {
    enabled: boolean
    sessionsDir: string
    indexDir: string
    maxResults: number
    distanceThreshold: number
}

export interface ResolvedConfig {
    model: string
    apiKey: string
    baseURL: string
    temperature: number
    maxTokens: number
    logLevel: LogLevel
    embedding: { model: string; baseURL: string; apiKey: string }
    servers: ServerDescriptor[]
    strategy: StrategyProfile
    sandbox: { maxToolCalls: number }
    memory: MemoryConfig
    projectDir: string
    configDir: string
}
