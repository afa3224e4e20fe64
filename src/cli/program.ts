import { Command } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config, ResolvedConfig } from '../config/schema.js'
import { PlanningModeSchema } from '../config/schema.js'
import { type Container, createContainer } from '../core/container.js'
import { ConfigurationError, errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { renderResult, runPrompt, startREPL } from './repl.js'
import { colors, formatError } from './ui.js'

interface GlobalOptions {
    model?: string
    key?: string
    debug?: boolean
    mode?: string
    maxSteps?: string
}

function toCliFlags(options: GlobalOptions): Partial<Config> {
    const flags: Partial<Config> = {}
    if (options.model) flags.model = options.model
    if (options.key) flags.apiKey = options.key
    if (options.debug) flags.logLevel = 'debug'

    const strategy: NonNullable<Config['strategy']> = {}
    if (options.mode) {
        const mode = PlanningModeSchema.safeParse(options.mode)
        if (!mode.success) throw new ConfigurationError(`Unknown planning mode '${options.mode}'`)
        strategy.planningMode = mode.data
    }
    if (options.maxSteps) {
        const steps = Number.parseInt(options.maxSteps, 10)
        if (!Number.isInteger(steps) || steps <= 0) throw new ConfigurationError('--max-steps must be a positive integer')
        strategy.maxSteps = steps
    }
    if (Object.keys(strategy).length > 0) flags.strategy = strategy
    return flags
}

async function resolveConfig(options: GlobalOptions): Promise<ResolvedConfig> {
    return loadConfig({ fs: new NodeFileSystem(), cliFlags: toCliFlags(options) })
}

async function withContainer(options: GlobalOptions, fn: (container: Container) => Promise<void>): Promise<void> {
    const container = createContainer(await resolveConfig(options))
    try {
        await container.initialize()
        await fn(container)
    } finally {
        await container.shutdown()
    }
}

function fail(error: unknown): never {
    console.error(formatError(errorMessage(error)))
    process.exit(1)
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('stepper')
        .description('Tool-using agent that plans and runs code against MCP tool servers')
        .version('0.1.0')
        .option('-p, --prompt <text>', 'Run a single prompt')
        .option('-m, --model <model>', 'LLM model to use')
        .option('-k, --key <key>', 'API key for the LLM endpoint')
        .option('--mode <mode>', 'Planning mode (conservative | exploratory)')
        .option('--max-steps <n>', 'Maximum PLAN+EXECUTE steps per session')
        .option('--debug', 'Enable debug logging')
        .action(async (options: GlobalOptions & { prompt?: string }) => {
            try {
                const config = await resolveConfig(options)
                if (!config.apiKey) {
                    throw new ConfigurationError('No API key configured. Set STEPPER_API_KEY or pass --key.')
                }
                const container = createContainer(config)
                try {
                    await container.initialize()
                    if (options.prompt) {
                        const result = await runPrompt(container, options.prompt)
                        console.log(renderResult(result))
                    } else {
                        await startREPL(container)
                    }
                } finally {
                    await container.shutdown()
                }
            } catch (error) {
                fail(error)
            }
        })

    program
        .command('tools')
        .description('Discover the configured tool servers and list their tools')
        .action(async () => {
            try {
                await withContainer(program.opts<GlobalOptions>(), async ({ dispatcher }) => {
                    for (const server of dispatcher.getServerDescriptions()) {
                        const tools = dispatcher.getToolsFromServers([server.id])
                        console.log(`${colors.server(server.id)} ${colors.dim(server.description)}`)
                        if (tools.length === 0) console.log(colors.warn('  (no tools)'))
                        for (const tool of tools) {
                            console.log(`  ${colors.tool(tool.name)} ${colors.dim(tool.description)}`)
                        }
                    }
                })
            } catch (error) {
                fail(error)
            }
        })

    program
        .command('recall <query>')
        .description('Search past sessions for similar questions')
        .option('-n, --limit <n>', 'Number of results', '5')
        .action(async (query: string, options: { limit: string }) => {
            try {
                const container = createContainer(await resolveConfig(program.opts<GlobalOptions>()))
                const limit = Number.parseInt(options.limit, 10) || 5
                const hits = await container.memoryIndex.search(query, limit)
                if (hits.length === 0) {
                    console.log(colors.dim('No matching sessions.'))
                    return
                }
                for (const { entry, distance } of hits) {
                    console.log(`${colors.dim(distance.toFixed(4))} ${colors.bold(entry.user_query)}`)
                    console.log(`       ${entry.final_answer}`)
                }
            } catch (error) {
                fail(error)
            }
        })

    return program
}
