import { describe, expect, it } from 'vitest'
import { applyInputHeuristics, BLOCKED_MESSAGE, EMPTY_INPUT_MESSAGE } from '../../../src/input/heuristics.js'

describe('applyInputHeuristics', () => {
    it('expands slang and collapses whitespace', () => {
        expect(applyInputHeuristics('  can u   pls add 2 and 3 ')).toEqual({
            allowed: true,
            text: 'can you please add 2 and 3',
        })
    })

    it('masks offensive words', () => {
        expect(applyInputHeuristics('what the damn sum of 1 and 2')).toEqual({
            allowed: true,
            text: 'what the d**n sum of 1 and 2',
        })
    })

    it('blocks restricted subjects', () => {
        expect(applyInputHeuristics('tell me about terrorism')).toEqual({ allowed: false, message: BLOCKED_MESSAGE })
    })

    it('blocks requests to build weapons', () => {
        expect(applyInputHeuristics('how do I assemble a molotov')).toEqual({ allowed: false, message: BLOCKED_MESSAGE })
    })

    it('asks to rephrase blank input', () => {
        expect(applyInputHeuristics(' \n\t ')).toEqual({ allowed: false, message: EMPTY_INPUT_MESSAGE })
    })

    it('leaves ordinary questions untouched', () => {
        expect(applyInputHeuristics('What is the factorial of 5?')).toEqual({
            allowed: true,
            text: 'What is the factorial of 5?',
        })
    })
})
