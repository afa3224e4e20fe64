import { err, ok, type Result } from '../core/result.js'

export const MAX_FACTORIAL_INPUT = 1000
export const MAX_EXACT_EXPONENT = 1024
export const MAX_FIBONACCI_COUNT = 1000

export function add(a: number, b: number): Result<string> {
    return ok(String(a + b))
}

export function subtract(a: number, b: number): Result<string> {
    return ok(String(a - b))
}

export function multiply(a: number, b: number): Result<string> {
    return ok(String(a * b))
}

export function divide(a: number, b: number): Result<string> {
    if (b === 0) return err('Division by zero')
    return ok(String(a / b))
}

export function power(a: number, b: number): Result<string> {
    // Exact for integer bases and bounded non-negative integer exponents.
    if (Number.isInteger(a) && Number.isInteger(b) && b >= 0 && b <= MAX_EXACT_EXPONENT) {
        return ok((BigInt(a) ** BigInt(b)).toString())
    }
    return ok(String(a ** b))
}

export function sin(a: number): Result<string> {
    return ok(String(Math.sin(a)))
}

export function cos(a: number): Result<string> {
    return ok(String(Math.cos(a)))
}

export function tan(a: number): Result<string> {
    return ok(String(Math.tan(a)))
}

export function factorial(n: number): Result<string> {
    if (!Number.isInteger(n)) return err('Factorial is only defined for integers')
    if (n < 0) return err('Factorial of a negative number')
    if (n > MAX_FACTORIAL_INPUT) return err(`Factorial input too large (max ${MAX_FACTORIAL_INPUT})`)
    let acc = 1n
    for (let i = 2n; i <= BigInt(n); i++) acc *= i
    return ok(acc.toString())
}

export function cbrt(a: number): Result<string> {
    return ok(String(Math.cbrt(a)))
}

export function remainder(a: number, b: number): Result<string> {
    if (b === 0) return err('Division by zero')
    return ok(String(a % b))
}

export function stringsToCharsToInt(text: string): Result<string> {
    return ok(JSON.stringify([...text].map((c) => c.codePointAt(0) ?? 0)))
}

export function intListToExponentialSum(numbers: readonly number[]): Result<string> {
    return ok(String(numbers.reduce((sum, n) => sum + Math.exp(n), 0)))
}

export function fibonacciNumbers(n: number): Result<string> {
    if (n <= 0) return ok('[]')
    if (n > MAX_FIBONACCI_COUNT) return err(`Too many Fibonacci numbers requested (max ${MAX_FIBONACCI_COUNT})`)
    const fib = [0, 1]
    while (fib.length < n) {
        fib.push((fib[fib.length - 1] ?? 0) + (fib[fib.length - 2] ?? 0))
    }
    return ok(JSON.stringify(fib.slice(0, n)))
}
