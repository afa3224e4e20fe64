import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type {
    RemoteTool,
    ServerConnector,
    ServerDescriptor,
    ToolCallPayload,
    ToolContent,
    ToolServerSession,
} from './types.js'

export function resolveEnv(env?: Record<string, string>): Record<string, string> {
    if (!env) return {}
    const resolved: Record<string, string> = {}
    for (const [key, value] of Object.entries(env)) {
        resolved[key] = value.replace(/\$\{(\w+)\}/g, (_, name: string) => process.env[name] ?? '')
    }
    return resolved
}

function inheritedEnv(): Record<string, string> {
    const env: Record<string, string> = {}
    for (const [key, value] of Object.entries(process.env)) {
        if (value !== undefined) env[key] = value
    }
    return env
}

export function resolveCommand(server: ServerDescriptor): { command: string; args: string[] } {
    const args = server.args ?? []
    if (server.command) {
        return { command: server.command, args: server.script ? [server.script, ...args] : args }
    }
    return { command: process.execPath, args: server.script ? [server.script, ...args] : args }
}

function toContent(item: unknown): ToolContent {
    if (typeof item === 'object' && item !== null && 'text' in item && typeof item.text === 'string') {
        return { text: item.text }
    }
    return { text: JSON.stringify(item) }
}

export function toPayload(result: object): ToolCallPayload {
    const content = 'content' in result ? result.content : undefined
    const items: unknown[] = Array.isArray(content) ? content : []
    return {
        content: items.map(toContent),
        success: !('isError' in result && result.isError === true),
    }
}

function createSession(client: Client): ToolServerSession {
    return {
        async listTools(): Promise<RemoteTool[]> {
            const tools: RemoteTool[] = []
            let cursor: string | undefined
            do {
                const page = await client.listTools(cursor ? { cursor } : undefined)
                for (const t of page.tools) {
                    tools.push({ name: t.name, description: t.description ?? '', inputSchema: t.inputSchema })
                }
                cursor = page.nextCursor
            } while (cursor)
            return tools
        },

        async callTool(name: string, args: Record<string, unknown>): Promise<ToolCallPayload> {
            return toPayload(await client.callTool({ name, arguments: args }))
        },
    }
}

/** Spawns the server as a child process speaking MCP over stdio, once per session. */
export class StdioServerConnector implements ServerConnector {
    constructor(
        private logger: Logger,
        private clientInfo = { name: 'stepper', version: '0.1.0' }
    ) {}

    async withSession<T>(server: ServerDescriptor, fn: (session: ToolServerSession) => Promise<T>): Promise<T> {
        const { command, args } = resolveCommand(server)
        const transport = new StdioClientTransport({
            command,
            args,
            cwd: server.cwd,
            env: { ...inheritedEnv(), ...resolveEnv(server.env) },
        })
        const client = new Client(this.clientInfo)

        try {
            await client.connect(transport)
            return await fn(createSession(client))
        } finally {
            await client.close().catch((error: unknown) => {
                this.logger.debug({ server: server.id, error: errorMessage(error) }, 'mcp:close-failed')
            })
        }
    }
}
