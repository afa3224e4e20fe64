import path from 'node:path'
import { ConfigurationError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, DEFAULT_EMBEDDING, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig, type ServerDescriptor } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}

    let raw: unknown
    try {
        raw = await fs.readJSON<unknown>(filePath)
    } catch (error) {
        throw new ConfigurationError(`Config file ${filePath} is not valid JSON`, { cause: error })
    }

    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid config in ${filePath}: ${parsed.error.message}`)
    }
    return parsed.data
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        const { embedding, strategy, sandbox, memory, ...rest } = cfg
        for (const [key, value] of Object.entries(rest)) {
            if (value !== undefined) {
                Object.assign(merged, { [key]: value })
            }
        }
        // Sections merge key by key so a later layer overrides single settings.
        if (embedding) merged.embedding = { ...merged.embedding, ...embedding }
        if (strategy) merged.strategy = { ...merged.strategy, ...strategy }
        if (sandbox) merged.sandbox = { ...merged.sandbox, ...sandbox }
        if (memory) merged.memory = { ...merged.memory, ...memory }
    }
    return merged
}

function readEnvConfig(): Config {
    const envConfig: Config = {}
    if (process.env.STEPPER_API_KEY) envConfig.apiKey = process.env.STEPPER_API_KEY
    if (process.env.STEPPER_MODEL) envConfig.model = process.env.STEPPER_MODEL
    const level = LogLevelSchema.safeParse(process.env.STEPPER_LOG_LEVEL)
    if (level.success) envConfig.logLevel = level.data
    if (process.env.STEPPER_EMBEDDING_API_KEY) {
        envConfig.embedding = { apiKey: process.env.STEPPER_EMBEDDING_API_KEY }
    }
    return envConfig
}

function resolveServer(server: ServerDescriptor, projectDir: string): ServerDescriptor {
    return {
        ...server,
        cwd: server.cwd ? path.resolve(projectDir, server.cwd) : projectDir,
    }
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd() } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))
    const envConfig = readEnvConfig()

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, envConfig, cliFlags)
    const apiKey = merged.apiKey ?? ''
    const memory = { ...DEFAULT_CONFIG.memory, ...merged.memory }

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        apiKey,
        projectDir,
        configDir: CONFIG_DIR,
        embedding: {
            model: merged.embedding?.model ?? DEFAULT_EMBEDDING.model,
            baseURL: merged.embedding?.baseURL ?? DEFAULT_EMBEDDING.baseURL,
            apiKey: merged.embedding?.apiKey ?? apiKey,
        },
        servers: (merged.servers ?? DEFAULT_CONFIG.servers).map((s) => resolveServer(s, projectDir)),
        strategy: { ...DEFAULT_CONFIG.strategy, ...merged.strategy },
        sandbox: { ...DEFAULT_CONFIG.sandbox, ...merged.sandbox },
        memory: {
            ...memory,
            sessionsDir: path.resolve(projectDir, memory.sessionsDir),
            indexDir: path.resolve(projectDir, memory.indexDir),
        },
    }
}
