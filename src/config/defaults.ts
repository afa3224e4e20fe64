import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'apiKey' | 'embedding' | 'projectDir' | 'configDir'> = {
    model: 'google/gemini-2.0-flash-001',
    baseURL: 'https://openrouter.ai/api/v1',
    temperature: 0.1,
    maxTokens: 2048,
    logLevel: 'info',
    servers: [],
    strategy: {
        planningMode: 'conservative',
        memoryFallbackEnabled: true,
        maxSteps: 3,
        maxLifelinesPerStep: 3,
    },
    sandbox: { maxToolCalls: 5 },
    memory: {
        enabled: true,
        sessionsDir: '.stepper/memory/sessions',
        indexDir: '.stepper/memory/index',
        maxResults: 2,
        // Squared L2 over unit-length embeddings lies in [0, 4].
        distanceThreshold: 0.8,
    },
}

export const DEFAULT_EMBEDDING = {
    model: 'text-embedding-3-small',
    baseURL: 'https://api.openai.com/v1',
}

export const CONFIG_DIR = `${process.env.HOME ?? '~'}/.config/stepper`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`
export const LOCAL_CONFIG_DIR = '.stepper'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
