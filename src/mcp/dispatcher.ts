import { ConfigurationError, errorMessage, ToolInvocationError, ToolNotFoundError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { StdioServerConnector } from './connector.js'
import type {
    RemoteTool,
    ServerConnector,
    ServerDescriptor,
    ServerSummary,
    ToolCallPayload,
    ToolDescriptor,
} from './types.js'

interface ToolEntry {
    server: ServerDescriptor
    tool: ToolDescriptor
}

/**
 * Routes tool calls by name to the server that advertised the tool.
 *
 * The tool map is built once by `initialize()` and only read afterwards, so
 * concurrent sessions can share one instance. Every call opens its own
 * connection to the owning server and closes it before returning; there is
 * no pooling and no retry.
 */
export class Dispatcher {
    private toolMap = new Map<string, ToolEntry>()
    private serverTools = new Map<string, ToolDescriptor[]>()
    private initialized = false

    constructor(
        private servers: readonly ServerDescriptor[],
        private logger: Logger,
        private connector: ServerConnector = new StdioServerConnector(logger)
    ) {}

    async initialize(): Promise<void> {
        if (this.servers.length === 0) {
            throw new ConfigurationError('No tool servers configured')
        }
        const ids = new Set<string>()
        for (const server of this.servers) {
            if (ids.has(server.id)) throw new ConfigurationError(`Duplicate tool server id '${server.id}'`)
            ids.add(server.id)
        }

        for (const server of this.servers) {
            try {
                const tools = await this.connector.withSession(server, (session) => session.listTools())
                this.register(server, tools)
                this.logger.info({ server: server.id, tools: tools.map((t) => t.name) }, 'Tool server discovered')
            } catch (error) {
                this.logger.error(`Tool server '${server.id}' discovery failed: ${errorMessage(error)}`)
            }
        }

        this.initialized = true
        this.logger.info({ servers: this.serverTools.size, tools: this.toolMap.size }, 'Dispatcher ready')
    }

    private register(server: ServerDescriptor, tools: RemoteTool[]): void {
        const descriptors: ToolDescriptor[] = []

        for (const remote of tools) {
            const tool: ToolDescriptor = {
                name: remote.name,
                description: remote.description ?? '',
                inputSchema: remote.inputSchema,
                serverId: server.id,
            }

            const previous = this.toolMap.get(tool.name)
            if (previous && previous.server.id !== server.id) {
                this.logger.warn(
                    { tool: tool.name, previous: previous.server.id, next: server.id },
                    'Tool name collision, last registered server wins'
                )
                const owned = this.serverTools.get(previous.server.id)
                if (owned) {
                    this.serverTools.set(
                        previous.server.id,
                        owned.filter((t) => t.name !== tool.name)
                    )
                }
            }

            this.toolMap.set(tool.name, { server, tool })
            descriptors.push(tool)
        }

        this.serverTools.set(server.id, descriptors)
    }

    async callTool(name: string, args: Record<string, unknown> = {}): Promise<ToolCallPayload> {
        const entry = this.toolMap.get(name)
        if (!entry) throw new ToolNotFoundError(name)

        const started = Date.now()
        let payload: ToolCallPayload
        try {
            payload = await this.connector.withSession(entry.server, (session) => session.callTool(name, args))
        } catch (error) {
            this.logger.warn({ tool: name, server: entry.server.id, error: errorMessage(error) }, 'tool:failed')
            throw new ToolInvocationError(name, entry.server.id, { cause: error })
        }

        this.logger.debug(
            { tool: name, server: entry.server.id, success: payload.success, duration: Date.now() - started },
            'tool:called'
        )
        return payload
    }

    getOwner(name: string): string | undefined {
        return this.toolMap.get(name)?.server.id
    }

    getTool(name: string): ToolDescriptor | undefined {
        return this.toolMap.get(name)?.tool
    }

    getAllTools(): ToolDescriptor[] {
        return [...this.toolMap.values()].map((e) => e.tool)
    }

    getToolsFromServers(serverIds: readonly string[]): ToolDescriptor[] {
        const tools: ToolDescriptor[] = []
        for (const id of serverIds) {
            tools.push(...(this.serverTools.get(id) ?? []))
        }
        return tools
    }

    listToolNames(): string[] {
        return [...this.toolMap.keys()]
    }

    getServerDescriptions(): ServerSummary[] {
        return this.servers.map((s) => ({ id: s.id, description: s.description }))
    }

    isInitialized(): boolean {
        return this.initialized
    }

    async shutdown(): Promise<void> {
        this.toolMap.clear()
        this.serverTools.clear()
        this.initialized = false
    }
}
