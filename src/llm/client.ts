import OpenAI from 'openai'
import type { ResolvedConfig } from '../config/schema.js'
import { errorMessage, IndexUnavailableError, TransientError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { CircuitBreaker, withRetry } from './retry.js'
import type { ChatMessage, ChatParams, ChatResponse, Embedder, LLMClient } from './types.js'

function toOpenAIMessages(messages: ChatMessage[]): OpenAI.ChatCompletionMessageParam[] {
    return messages.map((m): OpenAI.ChatCompletionMessageParam => {
        switch (m.role) {
            case 'system':
                return { role: 'system', content: m.content }
            case 'user':
                return { role: 'user', content: m.content }
            case 'assistant':
                return { role: 'assistant', content: m.content }
        }
    })
}

// Connection resets carry no HTTP status, so they would otherwise classify as permanent.
async function retryable<T>(fn: () => Promise<T>): Promise<T> {
    try {
        return await fn()
    } catch (error) {
        if (error instanceof OpenAI.APIConnectionError) {
            throw new TransientError(error.message, { cause: error })
        }
        throw error
    }
}

export function createLLMClient(config: ResolvedConfig, logger: Logger): LLMClient {
    const openai = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        defaultHeaders: { 'X-Title': 'stepper' },
    })

    const breaker = new CircuitBreaker('llm')

    return {
        async chat(params: ChatParams): Promise<ChatResponse> {
            const model = params.model ?? config.model

            const result = await breaker.execute(() =>
                withRetry(
                    () =>
                        retryable(async () => {
                            const response = await openai.chat.completions.create(
                                {
                                    model,
                                    messages: toOpenAIMessages(params.messages),
                                    temperature: params.temperature ?? config.temperature,
                                    max_tokens: params.maxTokens ?? config.maxTokens,
                                },
                                { signal: params.signal }
                            )

                            const choice = response.choices[0]
                            if (!choice) throw new Error('No response from LLM')

                            return {
                                content: choice.message.content ?? '',
                                finishReason: choice.finish_reason === 'length' ? ('length' as const) : ('stop' as const),
                                usage: {
                                    promptTokens: response.usage?.prompt_tokens ?? 0,
                                    completionTokens: response.usage?.completion_tokens ?? 0,
                                },
                            }
                        }),
                    {
                        maxRetries: 3,
                        baseDelay: 1000,
                        maxDelay: 30000,
                        onRetry: (attempt, error) =>
                            logger.warn({ model, attempt, error: errorMessage(error) }, 'llm:retry'),
                    }
                )
            )

            logger.debug({ model, usage: result.usage, finishReason: result.finishReason }, 'llm:response')
            return result
        },
    }
}

export function createEmbedder(config: ResolvedConfig, logger: Logger): Embedder {
    const { model, baseURL, apiKey } = config.embedding
    const openai = new OpenAI({ apiKey, baseURL })
    const breaker = new CircuitBreaker('embeddings')

    return {
        model,
        async embed(text: string, signal?: AbortSignal): Promise<number[]> {
            try {
                return await breaker.execute(() =>
                    withRetry(() =>
                        retryable(async () => {
                            const response = await openai.embeddings.create({ model, input: text }, { signal })
                            const embedding = response.data[0]?.embedding
                            if (!embedding) throw new Error('Embedding response contained no vectors')
                            return embedding
                        })
                    )
                )
            } catch (error) {
                logger.warn({ model, error: errorMessage(error) }, 'embedding:failed')
                throw new IndexUnavailableError(`Embedding backend unavailable: ${errorMessage(error)}`, {
                    cause: error,
                })
            }
        },
    }
}
