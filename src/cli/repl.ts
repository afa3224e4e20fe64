import { createInterface } from 'node:readline/promises'
import * as clack from '@clack/prompts'
import { runSession, type SessionResult } from '../agent/session.js'
import type { Container } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { createProgressTracker } from './progress.js'
import { banner, colors, formatAnswer, formatError, formatIncomplete } from './ui.js'

export function renderResult(result: SessionResult): string {
    switch (result.status) {
        case 'rejected':
            return colors.warn(result.message)
        case 'final':
            return formatAnswer(result.answer, result.bestEffort)
        case 'incomplete':
            return formatIncomplete(result.lastText, result.steps)
    }
}

interface PromptSpinner {
    start(msg?: string): void
    stop(msg?: string, code?: number): void
    message(msg?: string): void
}

/** Where Ctrl+C arrives: the process, or a readline interface that holds the terminal in raw mode. */
export interface InterruptSource {
    on(event: 'SIGINT', listener: () => void): unknown
    off(event: 'SIGINT', listener: () => void): unknown
}

export interface RunPromptOptions {
    interrupts?: InterruptSource
    spinner?: PromptSpinner
}

/** Runs one query with a spinner; Ctrl+C stops the session between steps. */
export async function runPrompt(container: Container, text: string, options: RunPromptOptions = {}): Promise<SessionResult> {
    const { interrupts = process, spinner = clack.spinner() } = options
    const controller = new AbortController()
    const onSigint = () => controller.abort()
    interrupts.on('SIGINT', onSigint)

    spinner.start('Thinking...')
    const progress = createProgressTracker(container.eventBus, spinner)
    try {
        const result = await runSession(container, text, controller.signal)
        spinner.stop(result.status === 'final' ? 'Done' : 'Stopped')
        return result
    } catch (error) {
        spinner.stop('Error')
        throw error
    } finally {
        progress.dispose()
        interrupts.off('SIGINT', onSigint)
    }
}

export async function startREPL(container: Container): Promise<void> {
    console.log(banner())
    console.log(colors.dim(`Model: ${container.config.model}`))
    console.log(colors.dim(`Tools: ${container.dispatcher.listToolNames().length} from ${container.config.servers.length} servers`))
    console.log(colors.dim('Type exit to quit\n'))

    const rl = createInterface({ input: process.stdin, output: process.stdout })
    try {
        while (true) {
            let input: string
            try {
                input = await rl.question('> ')
            } catch {
                // stdin closed
                break
            }

            const text = input.trim()
            if (!text) continue
            if (text === 'exit' || text === 'quit') break

            try {
                const result = await runPrompt(container, text, { interrupts: rl })
                console.log(`${renderResult(result)}\n`)
            } catch (error) {
                console.log(formatError(errorMessage(error)))
            }
        }
    } finally {
        rl.close()
        console.log(colors.dim('Goodbye!'))
    }
}
