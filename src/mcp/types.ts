import type { ServerDescriptor } from '../config/schema.js'

export type { ServerDescriptor }

export interface ToolDescriptor {
    name: string
    description: string
    inputSchema: Record<string, unknown>
    serverId: string
}

export interface ToolContent {
    text: string
}

/** Raw result of one tool call, as returned by the owning server. */
export interface ToolCallPayload {
    content: ToolContent[]
    success: boolean
}

export interface ToolCallRecord {
    toolName: string
    arguments: Record<string, unknown>
    result: ToolCallPayload | null
    success: boolean
    timestamp: string
    duration: number
    error?: string
}

export interface ServerSummary {
    id: string
    description: string
}

export interface RemoteTool {
    name: string
    description?: string
    inputSchema: Record<string, unknown>
}

export interface ToolServerSession {
    listTools(): Promise<RemoteTool[]>
    callTool(name: string, args: Record<string, unknown>): Promise<ToolCallPayload>
}

/**
 * Opens a session with one tool server for the duration of `fn` and tears it
 * down afterwards, whether `fn` resolves or rejects.
 */
export interface ServerConnector {
    withSession<T>(server: ServerDescriptor, fn: (session: ToolServerSession) => Promise<T>): Promise<T>
}
