import { describe, expect, it } from 'vitest'
import { IndexUnavailableError } from '../../../src/core/errors.js'
import type { SearchHit } from '../../../src/memory/types.js'
import { type HistorySearch, NO_HISTORY_MESSAGE, searchHistory } from '../../../src/servers/memory-server.js'

function index(hits: SearchHit[] | Error): HistorySearch & { requests: Array<[string, number | undefined]> } {
    const requests: Array<[string, number | undefined]> = []
    return {
        requests,
        async search(query, k) {
            requests.push([query, k])
            if (hits instanceof Error) throw hits
            return hits
        },
    }
}

describe('searchHistory', () => {
    it('returns hits as a JSON list', async () => {
        const fake = index([
            {
                entry: { user_query: 'What is 2+2?', final_answer: '4', source_file: '/s/a.jsonl', timestamp: 10 },
                distance: 0.25,
            },
        ])

        const response = await searchHistory(fake, 'sum of two and two', 3)

        expect(fake.requests).toEqual([['sum of two and two', 3]])
        expect(response).toEqual({
            content: [
                {
                    type: 'text',
                    text: '[{"l2_distance":0.25,"user_query":"What is 2+2?","final_answer":"4","source_file":"/s/a.jsonl","timestamp":10}]',
                },
            ],
        })
    })

    it('reports an empty history as an error', async () => {
        expect(await searchHistory(index([]), 'q', 5)).toEqual({
            content: [{ type: 'text', text: `Error: ${NO_HISTORY_MESSAGE}` }],
            isError: true,
        })
    })

    it('reports search failures as an error', async () => {
        const response = await searchHistory(index(new IndexUnavailableError('embedding backend down')), 'q', 5)
        expect(response).toEqual({
            content: [{ type: 'text', text: 'Error: An error occurred during search: embedding backend down' }],
            isError: true,
        })
    })
})
