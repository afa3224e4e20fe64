import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

// Logs go to stderr; stdout carries answers.
export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    if (config.logLevel === 'debug' || config.logLevel === 'trace') {
        return pino({
            name: 'stepper',
            level: config.logLevel,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
        })
    }
    return pino({ name: 'stepper', level: config.logLevel }, pino.destination(2))
}
