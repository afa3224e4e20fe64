import { AgentLoop } from '../agent/loop.js'
import type { ResolvedConfig } from '../config/schema.js'
import { createEmbedder, createLLMClient } from '../llm/client.js'
import type { Embedder, LLMClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { StdioServerConnector } from '../mcp/connector.js'
import { Dispatcher } from '../mcp/dispatcher.js'
import type { ServerConnector } from '../mcp/types.js'
import { MemoryIndex } from '../memory/memory-index.js'
import { LlmPlanner } from '../planner/llm-planner.js'
import type { Planner } from '../planner/types.js'
import { SandboxExecutor } from '../sandbox/executor.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    llmClient: LLMClient
    embedder: Embedder
    dispatcher: Dispatcher
    executor: SandboxExecutor
    planner: Planner
    memoryIndex: MemoryIndex
    agentLoop: AgentLoop
    initialize(): Promise<void>
    shutdown(): Promise<void>
}

/** Replacements for the services that reach outside the process. */
export interface ContainerOverrides {
    logger?: Logger
    fs?: FileSystem
    llmClient?: LLMClient
    embedder?: Embedder
    connector?: ServerConnector
    planner?: Planner
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const fs = overrides.fs ?? new NodeFileSystem()
    const llmClient = overrides.llmClient ?? createLLMClient(config, logger)
    const embedder = overrides.embedder ?? createEmbedder(config, logger)
    const dispatcher = new Dispatcher(
        config.servers,
        logger,
        overrides.connector ?? new StdioServerConnector(logger)
    )
    const executor = new SandboxExecutor(logger, config.sandbox.maxToolCalls)
    const planner = overrides.planner ?? new LlmPlanner(llmClient, logger)
    const memoryIndex = new MemoryIndex(fs, embedder, logger, config.memory)
    const agentLoop = new AgentLoop({
        planner,
        dispatcher,
        executor,
        profile: config.strategy,
        maxToolCalls: config.sandbox.maxToolCalls,
        logger,
        events: eventBus,
    })

    return {
        config,
        logger,
        eventBus,
        fs,
        llmClient,
        embedder,
        dispatcher,
        executor,
        planner,
        memoryIndex,
        agentLoop,

        async initialize() {
            await dispatcher.initialize()
        },

        async shutdown() {
            const errors: Error[] = []
            try {
                await dispatcher.shutdown()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            try {
                eventBus.removeAll()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            if (errors.length > 0) {
                logger.warn({ errors: errors.map((e) => e.message) }, 'Errors during shutdown')
            }
        },
    }
}
