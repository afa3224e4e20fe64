import type { StrategyProfile } from '../config/schema.js'
import type { ToolDescriptor } from '../mcp/types.js'
import type { MemoryItem } from '../memory/types.js'
import type { Perception } from '../planner/types.js'
import { filterToolsByHint } from '../planner/tools.js'

export const MEMORY_FALLBACK_LIMIT = 5

export interface ToolCatalogue {
    getAllTools(): ToolDescriptor[]
    getToolsFromServers(serverIds: readonly string[]): ToolDescriptor[]
    getTool(name: string): ToolDescriptor | undefined
}

export type ToolSource = 'hint' | 'servers' | 'all' | 'memory'

export interface ToolSelection {
    tools: ToolDescriptor[]
    source: ToolSource
}

export interface ToolSelectionRequest {
    perception: Perception
    forcedReplan: boolean
    profile: StrategyProfile
    catalogue: ToolCatalogue
    memoryItems: readonly MemoryItem[]
}

/** Distinct names of successful tool calls, most recent first. */
export function findRecentSuccessfulTools(items: readonly MemoryItem[], limit = MEMORY_FALLBACK_LIMIT): string[] {
    const names: string[] = []
    for (let i = items.length - 1; i >= 0 && names.length < limit; i--) {
        const item = items[i]
        if (item?.type === 'tool_output' && item.success === true && item.tool_name && !names.includes(item.tool_name)) {
            names.push(item.tool_name)
        }
    }
    return names
}

/**
 * Picks the tools shown to the planner.
 *
 * Normal steps narrow the selected servers' tools by the perception hint.
 * A forced replan widens to every tool, except that exploratory profiles with
 * memory fallback first offer the tools that recently worked in this session.
 */
export function selectTools(request: ToolSelectionRequest): ToolSelection {
    const { perception, forcedReplan, profile, catalogue } = request

    if (forcedReplan) {
        if (profile.planningMode === 'exploratory' && profile.memoryFallbackEnabled) {
            const tools: ToolDescriptor[] = []
            for (const name of findRecentSuccessfulTools(request.memoryItems)) {
                const tool = catalogue.getTool(name)
                if (tool) tools.push(tool)
            }
            if (tools.length > 0) return { tools, source: 'memory' }
        }
        return { tools: catalogue.getAllTools(), source: 'all' }
    }

    const fromServers = catalogue.getToolsFromServers(perception.selectedServers)
    if (fromServers.length === 0) {
        const all = catalogue.getAllTools()
        const hinted = filterToolsByHint(all, perception.toolHint)
        if (perception.toolHint.trim() && hinted.length > 0) return { tools: hinted, source: 'hint' }
        return { tools: all, source: 'all' }
    }

    const hinted = filterToolsByHint(fromServers, perception.toolHint)
    if (perception.toolHint.trim() && hinted.length > 0) return { tools: hinted, source: 'hint' }
    return { tools: fromServers, source: 'servers' }
}
