import type { ExplorationMode, PlanningMode } from '../config/schema.js'

export const PERCEPTION_PROMPT = `You are the perception module of a tool-using agent.

Read the user's request and decide which tool servers can help.

Available servers:
{server_descriptions}

User request:
{user_input}

Reply with a single JSON object and nothing else. It must match this JSON schema:
{response_schema}

Guidelines:
- selected_servers must only contain ids from the list above
- tool_hint should name a specific tool when you can guess one, otherwise leave it empty
- Do not answer the request yourself`

const PLAN_RULES = `Rules for the code:
- Define exactly one function: async function solve() { ... }
- Call tools only through: await mcp.callTool('<tool_name>', { ...arguments })
- A tool call returns { content: [{ text }], success }; parse content[0].text with JSON.parse when it holds JSON
- No imports, no require, no timers, no network or file access
- Return a string that starts with FINAL_ANSWER: when the answer is complete
- Return a string that starts with FURTHER_PROCESSING_REQUIRED: followed by the data when another step must use it
- Output only the code, without explanations`

export const CONSERVATIVE_PLAN_PROMPT = `You are the planning module of a tool-using agent. This is step {step_num} of at most {max_steps}.

Available tools:
{tool_descriptions}

What happened so far in this session:
{memory_texts}

User input:
{user_input}

Write JavaScript that solves the input with a single tool call when one tool suffices.

${PLAN_RULES}

Example:
async function solve() {
    const result = await mcp.callTool('add', { a: 2, b: 3 })
    return \`FINAL_ANSWER: \${result.content[0].text}\`
}`

export const EXPLORATORY_PARALLEL_PLAN_PROMPT = `You are the planning module of a tool-using agent. This is step {step_num} of at most {max_steps}.

Available tools:
{tool_descriptions}

What happened so far in this session:
{memory_texts}

User input:
{user_input}

Write JavaScript that tries the independent tools that could answer the input, one after another, and
keeps the first useful result. Wrap each attempt in try/catch so one failing tool does not stop the others.
At most 5 tool calls are allowed per plan.

${PLAN_RULES}`

export const EXPLORATORY_SEQUENTIAL_PLAN_PROMPT = `You are the planning module of a tool-using agent. This is step {step_num} of at most {max_steps}.

Available tools:
{tool_descriptions}

What happened so far in this session:
{memory_texts}

User input:
{user_input}

Write JavaScript that chains tools, feeding each result into the next call, and falls back to another
tool when a call fails. At most 5 tool calls are allowed per plan.

${PLAN_RULES}`

export function selectPlanPrompt(planningMode: PlanningMode, explorationMode?: ExplorationMode): string {
    if (planningMode === 'exploratory') {
        if (explorationMode === 'parallel') return EXPLORATORY_PARALLEL_PLAN_PROMPT
        if (explorationMode === 'sequential') return EXPLORATORY_SEQUENTIAL_PLAN_PROMPT
    }
    return CONSERVATIVE_PLAN_PROMPT
}

/** Replaces `{name}` placeholders; unknown placeholders are left as they are. */
export function fillTemplate(template: string, values: Record<string, string>): string {
    return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match)
}
