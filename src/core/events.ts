export type SessionStatus = 'final' | 'incomplete'

export type EventMap = {
    'session:start': { sessionId: string; input: string }
    'step:start': { sessionId: string; step: number; forcedReplan: boolean }
    'step:end': { sessionId: string; step: number; success: boolean; attempts: number }
    'tool:after': { sessionId: string; toolName: string; success: boolean; duration: number }
    'session:end': { sessionId: string; status: SessionStatus; steps: number }
}

type EventHandler<T> = (data: T) => void

export class TypedEventEmitter {
    private handlers = new Map<string, Set<EventHandler<unknown>>>()

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        let set = this.handlers.get(event)
        if (!set) {
            set = new Set()
            this.handlers.set(event, set)
        }
        set.add(handler as EventHandler<unknown>)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers.get(event)?.delete(handler as EventHandler<unknown>)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers.get(event)
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch {
                // cross-cutting listeners should not crash the main flow
            }
        }
    }

    removeAll(): void {
        this.handlers.clear()
    }
}
