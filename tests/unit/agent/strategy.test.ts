import { describe, expect, it } from 'vitest'
import { findRecentSuccessfulTools, selectTools, type ToolCatalogue } from '../../../src/agent/strategy.js'
import type { StrategyProfile } from '../../../src/config/schema.js'
import type { ToolDescriptor } from '../../../src/mcp/types.js'
import { type MemoryItem, MemoryItemSchema } from '../../../src/memory/types.js'
import { perception } from '../../helpers/scripted-planner.js'

function tool(name: string, serverId: string): ToolDescriptor {
    return { name, description: name, inputSchema: {}, serverId }
}

const tools = [tool('add', 'math'), tool('factorial', 'math'), tool('lookup', 'docs')]

const catalogue: ToolCatalogue = {
    getAllTools: () => tools,
    getToolsFromServers: (ids) => tools.filter((t) => ids.includes(t.serverId)),
    getTool: (name) => tools.find((t) => t.name === name),
}

const conservative: StrategyProfile = {
    planningMode: 'conservative',
    memoryFallbackEnabled: true,
    maxSteps: 3,
    maxLifelinesPerStep: 0,
}
const exploratory: StrategyProfile = { ...conservative, planningMode: 'exploratory', explorationMode: 'parallel' }

function toolOutput(name: string, success: boolean, timestamp: number): MemoryItem {
    return MemoryItemSchema.parse({
        timestamp,
        type: 'tool_output',
        text: `Tool '${name}'`,
        session_id: 's',
        tool_name: name,
        success,
    })
}

function names(selection: { tools: ToolDescriptor[] }): string[] {
    return selection.tools.map((t) => t.name)
}

describe('selectTools', () => {
    it('narrows the selected servers by the hint', () => {
        const selection = selectTools({
            perception: perception({ toolHint: 'factorial', selectedServers: ['math'] }),
            forcedReplan: false,
            profile: conservative,
            catalogue,
            memoryItems: [],
        })
        expect(selection.source).toBe('hint')
        expect(names(selection)).toEqual(['factorial'])
    })

    it('keeps every tool of the selected servers when the hint matches none', () => {
        const selection = selectTools({
            perception: perception({ toolHint: 'sqrt', selectedServers: ['math'] }),
            forcedReplan: false,
            profile: conservative,
            catalogue,
            memoryItems: [],
        })
        expect(selection.source).toBe('servers')
        expect(names(selection)).toEqual(['add', 'factorial'])
    })

    it('uses every tool when no selected server has tools', () => {
        const selection = selectTools({
            perception: perception({ selectedServers: ['unknown'] }),
            forcedReplan: false,
            profile: conservative,
            catalogue,
            memoryItems: [],
        })
        expect(selection.source).toBe('all')
        expect(names(selection)).toEqual(['add', 'factorial', 'lookup'])
    })

    it('applies the hint to every tool when no server was selected', () => {
        const selection = selectTools({
            perception: perception({ toolHint: 'lookup' }),
            forcedReplan: false,
            profile: conservative,
            catalogue,
            memoryItems: [],
        })
        expect(selection).toEqual({ tools: [tools[2]], source: 'hint' })
    })

    it('widens to every tool on a forced replan', () => {
        const selection = selectTools({
            perception: perception({ toolHint: 'factorial', selectedServers: ['math'] }),
            forcedReplan: true,
            profile: conservative,
            catalogue,
            memoryItems: [toolOutput('add', true, 1)],
        })
        expect(selection.source).toBe('all')
        expect(names(selection)).toEqual(['add', 'factorial', 'lookup'])
    })

    it('offers recently successful tools on an exploratory forced replan', () => {
        const selection = selectTools({
            perception: perception(),
            forcedReplan: true,
            profile: exploratory,
            catalogue,
            memoryItems: [toolOutput('lookup', true, 1), toolOutput('add', true, 2), toolOutput('factorial', false, 3)],
        })
        expect(selection.source).toBe('memory')
        expect(names(selection)).toEqual(['add', 'lookup'])
    })

    it('widens to every tool when memory has no successful call', () => {
        const selection = selectTools({
            perception: perception(),
            forcedReplan: true,
            profile: exploratory,
            catalogue,
            memoryItems: [toolOutput('factorial', false, 1)],
        })
        expect(selection.source).toBe('all')
    })

    it('ignores memory when fallback is disabled', () => {
        const selection = selectTools({
            perception: perception(),
            forcedReplan: true,
            profile: { ...exploratory, memoryFallbackEnabled: false },
            catalogue,
            memoryItems: [toolOutput('add', true, 1)],
        })
        expect(selection.source).toBe('all')
    })
})

describe('findRecentSuccessfulTools', () => {
    it('returns distinct names, most recent first, up to the limit', () => {
        const items = [
            toolOutput('a', true, 1),
            toolOutput('b', true, 2),
            toolOutput('a', true, 3),
            toolOutput('c', false, 4),
            toolOutput('d', true, 5),
        ]
        expect(findRecentSuccessfulTools(items)).toEqual(['d', 'a', 'b'])
        expect(findRecentSuccessfulTools(items, 2)).toEqual(['d', 'a'])
    })
})
