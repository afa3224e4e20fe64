import type { EventMap, TypedEventEmitter } from '../core/events.js'

interface Spinner {
    message(msg: string): void
}

export interface ProgressTracker {
    dispose(): void
}

export function createProgressTracker(eventBus: TypedEventEmitter, spinner: Spinner): ProgressTracker {
    const onStepStart = (data: EventMap['step:start']) => {
        spinner.message(data.forcedReplan ? `Step ${data.step}: replanning with all tools...` : `Step ${data.step}: planning...`)
    }

    const onToolAfter = (data: EventMap['tool:after']) => {
        const secs = (data.duration / 1000).toFixed(1)
        spinner.message(`${data.toolName} ${data.success ? 'done' : 'failed'} (${secs}s)`)
    }

    const onStepEnd = (data: EventMap['step:end']) => {
        if (!data.success) spinner.message(`Step ${data.step} failed after ${data.attempts} attempts`)
    }

    eventBus.on('step:start', onStepStart)
    eventBus.on('tool:after', onToolAfter)
    eventBus.on('step:end', onStepEnd)

    return {
        dispose() {
            eventBus.off('step:start', onStepStart)
            eventBus.off('tool:after', onToolAfter)
            eventBus.off('step:end', onStepEnd)
        },
    }
}
