import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { type MemoryItem, type MemoryItemInput, MemoryItemSchema, serializeMemoryItem } from './types.js'

/**
 * Append-only log of one session's MemoryItems, one JSON line each, at
 * `<sessionsDir>/<sessionId>.jsonl`. Every `add` hits the disk before it
 * resolves.
 */
export class SessionLog {
    private items: MemoryItem[] = []
    readonly filePath: string

    constructor(
        private fs: FileSystem,
        sessionsDir: string,
        readonly sessionId: string,
        private logger?: Logger
    ) {
        this.filePath = path.join(sessionsDir, `${sessionId}.jsonl`)
    }

    /** Reads back an existing log. Lines that fail validation are skipped. */
    async load(): Promise<MemoryItem[]> {
        this.items = []
        if (!(await this.fs.exists(this.filePath))) return this.items

        const lines = (await this.fs.readText(this.filePath)).split('\n')
        for (const [index, line] of lines.entries()) {
            if (!line.trim()) continue
            const item = parseLine(line)
            if (item) {
                this.items.push(item)
            } else {
                this.logger?.warn({ file: this.filePath, line: index + 1 }, 'session-log:invalid-line')
            }
        }
        return this.items
    }

    async add(input: MemoryItemInput): Promise<MemoryItem> {
        const line = serializeMemoryItem(input)
        const item = MemoryItemSchema.parse(JSON.parse(line))
        await this.fs.mkdir(path.dirname(this.filePath))
        await this.fs.appendText(this.filePath, `${line}\n`)
        this.items.push(item)
        return item
    }

    async addToolOutput(
        toolName: string,
        toolArgs: Record<string, unknown>,
        toolResult: unknown,
        success: boolean,
        tags: string[] = []
    ): Promise<MemoryItem> {
        const rendered = typeof toolResult === 'string' ? toolResult : JSON.stringify(toolResult)
        return this.add({
            timestamp: Date.now() / 1000,
            type: 'tool_output',
            text: `Tool '${toolName}' ${success ? 'succeeded' : 'failed'}. Result: ${rendered}`,
            session_id: this.sessionId,
            tags,
            tool_name: toolName,
            tool_args: toolArgs,
            tool_result: toolResult,
            success,
        })
    }

    getItems(): readonly MemoryItem[] {
        return this.items
    }
}

export function parseLine(line: string): MemoryItem | undefined {
    let raw: unknown
    try {
        raw = JSON.parse(line)
    } catch {
        return undefined
    }
    const parsed = MemoryItemSchema.safeParse(raw)
    return parsed.success ? parsed.data : undefined
}
