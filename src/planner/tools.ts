import type { ToolDescriptor } from '../mcp/types.js'

export function summarizeTools(tools: readonly ToolDescriptor[]): string {
    if (tools.length === 0) return 'No tools available.'
    return tools.map((t) => `- ${t.name}: ${t.description}`).join('\n')
}

/** Keeps tools whose name occurs in `hint`. An empty hint keeps everything. */
export function filterToolsByHint(tools: readonly ToolDescriptor[], hint: string): ToolDescriptor[] {
    if (!hint.trim()) return [...tools]
    return tools.filter((t) => hint.includes(t.name))
}
