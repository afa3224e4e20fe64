import { pathToFileURL } from 'node:url'
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { z } from 'zod'
import { loadConfig } from '../config/loader.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { createEmbedder } from '../llm/client.js'
import { createLogger } from '../logger/index.js'
import { MemoryIndex } from '../memory/memory-index.js'
import { errorResponse, textResponse } from './response.js'

export const NO_HISTORY_MESSAGE = 'No historical conversations indexed yet.'

export interface HistorySearch {
    search: MemoryIndex['search']
}

export async function searchHistory(index: HistorySearch, query: string, maxResults: number) {
    try {
        const hits = await index.search(query, maxResults)
        if (hits.length === 0) return errorResponse(NO_HISTORY_MESSAGE)
        return textResponse(
            JSON.stringify(
                hits.map(({ entry, distance }) => ({
                    l2_distance: distance,
                    user_query: entry.user_query,
                    final_answer: entry.final_answer,
                    source_file: entry.source_file,
                    timestamp: entry.timestamp,
                }))
            )
        )
    } catch (error) {
        return errorResponse(`An error occurred during search: ${errorMessage(error)}`)
    }
}

export function createMemoryServer(index: HistorySearch): McpServer {
    const server = new McpServer({ name: 'stepper-memory', version: '0.1.0' })

    server.tool(
        'search_historical_conversations',
        'Search through past conversations for questions similar to the query. Returns a JSON list ordered by l2_distance.',
        {
            query: z.string().describe('The search query'),
            max_results: z.number().int().positive().default(5).describe('Maximum number of results to return'),
        },
        async ({ query, max_results }) => searchHistory(index, query, max_results)
    )

    return server
}

async function main(): Promise<void> {
    const fs = new NodeFileSystem()
    const config = await loadConfig({ fs })
    const logger = createLogger(config)
    const index = new MemoryIndex(fs, createEmbedder(config, logger), logger, config.memory)
    await createMemoryServer(index).connect(new StdioServerTransport())
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    main().catch((error: unknown) => {
        process.stderr.write(`memory server failed: ${errorMessage(error)}\n`)
        process.exit(1)
    })
}
