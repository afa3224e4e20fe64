import { pathToFileURL } from 'node:url'
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { z } from 'zod'
import * as math from './math-tools.js'
import { fromResult } from './response.js'

const pair = {
    a: z.number().describe('First operand'),
    b: z.number().describe('Second operand'),
}

export function createMathServer(): McpServer {
    const server = new McpServer({ name: 'stepper-math', version: '0.1.0' })

    server.tool('add', 'Adds two numbers.', pair, async ({ a, b }) => fromResult(math.add(a, b)))
    server.tool('subtract', 'Subtracts the second number from the first.', pair, async ({ a, b }) =>
        fromResult(math.subtract(a, b))
    )
    server.tool('multiply', 'Multiplies two numbers.', pair, async ({ a, b }) => fromResult(math.multiply(a, b)))
    server.tool('divide', 'Divides the first number by the second.', pair, async ({ a, b }) =>
        fromResult(math.divide(a, b))
    )
    server.tool('power', 'Raises the first number to the power of the second.', pair, async ({ a, b }) =>
        fromResult(math.power(a, b))
    )
    server.tool('sin', 'Calculates the sine of a number in radians.', { a: z.number() }, async ({ a }) =>
        fromResult(math.sin(a))
    )
    server.tool('cos', 'Calculates the cosine of a number in radians.', { a: z.number() }, async ({ a }) =>
        fromResult(math.cos(a))
    )
    server.tool('tan', 'Calculates the tangent of a number in radians.', { a: z.number() }, async ({ a }) =>
        fromResult(math.tan(a))
    )
    server.tool(
        'factorial',
        'Calculates the factorial of a non-negative integer.',
        { n: z.number().int().describe('Non-negative integer') },
        async ({ n }) => fromResult(math.factorial(n))
    )
    server.tool('cbrt', 'Calculates the cube root of a number.', { a: z.number() }, async ({ a }) =>
        fromResult(math.cbrt(a))
    )
    server.tool('remainder', 'Calculates the remainder of dividing the first number by the second.', pair, async ({ a, b }) =>
        fromResult(math.remainder(a, b))
    )
    server.tool(
        'strings_to_chars_to_int',
        'Converts each character of a string to its character code. Returns a JSON array.',
        { string: z.string() },
        async ({ string }) => fromResult(math.stringsToCharsToInt(string))
    )
    server.tool(
        'int_list_to_exponential_sum',
        'Sums e raised to each integer of a list.',
        { numbers: z.array(z.number().int()) },
        async ({ numbers }) => fromResult(math.intListToExponentialSum(numbers))
    )
    server.tool(
        'fibonacci_numbers',
        'Generates the first n Fibonacci numbers. Returns a JSON array.',
        { n: z.number().int() },
        async ({ n }) => fromResult(math.fibonacciNumbers(n))
    )

    return server
}

async function main(): Promise<void> {
    const server = createMathServer()
    await server.connect(new StdioServerTransport())
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    main().catch((error: unknown) => {
        process.stderr.write(`math server failed: ${error instanceof Error ? error.message : String(error)}\n`)
        process.exit(1)
    })
}
