export const FINAL_ANSWER_MARKER = 'FINAL_ANSWER:'
export const CONTINUE_MARKER = 'FURTHER_PROCESSING_REQUIRED:'

export type Evaluation =
    | { kind: 'final'; text: string }
    | { kind: 'continue'; text: string }
    | { kind: 'other'; text: string }

/** The only place the control markers are read. */
export function evaluateOutput(output: string): Evaluation {
    const text = output.trim()
    if (text.startsWith(FINAL_ANSWER_MARKER)) {
        return { kind: 'final', text: text.slice(FINAL_ANSWER_MARKER.length).trim() }
    }
    if (text.startsWith(CONTINUE_MARKER)) {
        return { kind: 'continue', text: text.slice(CONTINUE_MARKER.length).trim() }
    }
    return { kind: 'other', text }
}
