import { stripCodeFences } from './perception.js'
import type { PlanDraft } from './types.js'

export const INVALID_PLAN_ANSWER = 'FINAL_ANSWER: [Could not generate valid solve()]'

const SOLVE_DEFINITION = /^\s*(?:(?:async\s+)?function\s+solve\s*\(|(?:const|let)\s+solve\s*=)/m

export function definesSolve(code: string): boolean {
    return SOLVE_DEFINITION.test(code)
}

export function extractPlan(raw: string): PlanDraft {
    const code = stripCodeFences(raw)
    if (definesSolve(code)) return { kind: 'code', code }
    return { kind: 'answer', text: INVALID_PLAN_ANSWER }
}

export function planningFailedAnswer(message: string): string {
    return `FINAL_ANSWER: [planning failed: ${message}]`
}
