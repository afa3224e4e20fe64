import pc from 'picocolors'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    server: (id: string) => pc.cyan(`[${id}]`),
    tool: (name: string) => pc.blue(`${name}`),
}

export function banner(): string {
    return `${colors.brand('stepper')} ${colors.dim('v0.1.0')} tool-using agent`
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatAnswer(answer: string, bestEffort: boolean): string {
    return bestEffort ? `${answer}\n${colors.dim('(best effort)')}` : answer
}

export function formatIncomplete(lastText: string, steps: number): string {
    const detail = lastText ? `\n${colors.dim(`Last output: ${lastText}`)}` : ''
    return `${colors.warn(`No final answer after ${steps} steps.`)}${detail}`
}
