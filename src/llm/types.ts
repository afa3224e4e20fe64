export interface ChatMessage {
    role: 'system' | 'user' | 'assistant'
    content: string
}

export interface ChatParams {
    model?: string
    messages: ChatMessage[]
    temperature?: number
    maxTokens?: number
    signal?: AbortSignal
}

export interface ChatResponse {
    content: string
    finishReason: 'stop' | 'length'
    usage: { promptTokens: number; completionTokens: number }
}

export interface LLMClient {
    chat(params: ChatParams): Promise<ChatResponse>
}

export interface Embedder {
    readonly model: string
    embed(text: string, signal?: AbortSignal): Promise<number[]>
}
