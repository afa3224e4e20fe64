export type HeuristicResult = { allowed: true; text: string } | { allowed: false; message: string }

export const BLOCKED_MESSAGE = 'I’m sorry, but I can’t assist with that topic.'
export const EMPTY_INPUT_MESSAGE = 'Could you please rephrase that?'

const SLANG: Array<[RegExp, string]> = [
    [/\bu\b/gi, 'you'],
    [/\bur\b/gi, 'your'],
    [/\bwanna\b/gi, 'want to'],
    [/\bgonna\b/gi, 'going to'],
    [/\bgotta\b/gi, 'have to'],
    [/\bpls?\b/gi, 'please'],
    [/\btho\b/gi, 'though'],
    [/\bimo\b/gi, 'in my opinion'],
    [/\bidk\b/gi, 'I do not know'],
]

const OFFENSIVE_WORDS = ['damn', 'shit', 'fuck', 'bitch', 'bastard']

const BLOCKED_SUBJECTS = [
    'violence',
    'kill',
    'terrorism',
    'extremism',
    'weapon',
    'firearm',
    'gun',
    'bomb',
    'harm someone',
    'self harm',
    'drug manufacturing',
]

const HIGH_RISK_VERBS = '(?:make|build|assemble|manufacture|fabricate|construct|3d[- ]?print|cook(?: up)?|design)'
const HIGH_RISK_OBJECTS =
    '(?:gun|firearm|weapon|bomb|grenade|explosive|pipe bomb|chemical weapon|improvised explosive|ied|poison|molotov|silencer)'

const DANGEROUS_PATTERNS = [
    new RegExp(`\\b${HIGH_RISK_VERBS}\\b[^\\n]*\\b${HIGH_RISK_OBJECTS}\\b`, 'i'),
    new RegExp(`\\b${HIGH_RISK_OBJECTS}\\b[^\\n]*\\b${HIGH_RISK_VERBS}\\b`, 'i'),
    /\bhow to\b[^\n]*\b(gun|firearm|bomb|explosive|weapon)\b/i,
]

function mask(word: string): string {
    if (word.length <= 2) return '*'.repeat(word.length)
    return `${word[0]}${'*'.repeat(word.length - 2)}${word[word.length - 1]}`
}

/** Screens raw user input before a session starts. */
export function applyInputHeuristics(raw: string): HeuristicResult {
    const lowered = raw.toLowerCase()
    if (BLOCKED_SUBJECTS.some((topic) => lowered.includes(topic))) {
        return { allowed: false, message: BLOCKED_MESSAGE }
    }
    if (DANGEROUS_PATTERNS.some((pattern) => pattern.test(raw))) {
        return { allowed: false, message: BLOCKED_MESSAGE }
    }

    let text = raw
    for (const [pattern, replacement] of SLANG) {
        text = text.replace(pattern, replacement)
    }
    for (const word of OFFENSIVE_WORDS) {
        text = text.replace(new RegExp(`\\b${word}\\b`, 'gi'), mask)
    }

    text = text.replace(/\s+/g, ' ').trim()
    if (!text) return { allowed: false, message: EMPTY_INPUT_MESSAGE }
    return { allowed: true, text }
}
