import winston from 'winston'
import { Locator, serviceKey } from './registry'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
    readonly level: LogLevel
    debug(message: string, ...args: unknown[]): void
    info(message: string, ...args: unknown[]): void
    warn(message: string, ...args: unknown[]): void
    error(message: string, ...args: unknown[]): void
}

export const LoggerKey = serviceKey<Logger>('Logger')

const levelOrder: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
}

export const isLogLevel = (value: unknown): value is LogLevel => {
    return typeof value === 'string' && value in levelOrder
}

export const isLevelEnabled = (threshold: LogLevel, level: LogLevel): boolean => {
    return levelOrder[level] >= levelOrder[threshold]
}

const levelFromEnv = (): LogLevel => {
    const value = process.env.RXVM_LOG_LEVEL?.toLowerCase()
    return isLogLevel(value) ? value : 'warn'
}

function formatArgs(args: unknown[]): string {
    if (args.length === 0) {
        return ''
    }

    const parts = args.map((arg) => {
        if (arg instanceof Error) {
            return arg.stack ?? arg.message
        }

        if (typeof arg === 'object' && arg !== null) {
            try {
                return JSON.stringify(arg)
            } catch {
                return String(arg)
            }
        }

        return String(arg)
    })

    return ' ' + parts.join(' ')
}

export class WinstonLogger implements Logger {
    readonly level: LogLevel
    private readonly logger: winston.Logger

    constructor(level: LogLevel = levelFromEnv()) {
        this.level = level
        this.logger = winston.createLogger({
            level,
            transports: [
                new winston.transports.Console({
                    format: winston.format.combine(
                        winston.format.timestamp({ format: 'HH:mm:ss' }),
                        winston.format.errors({ stack: true }),
                        winston.format.splat(),
                        winston.format.printf(({ timestamp, level, message, stack }) => {
                            const suffix = typeof stack === 'string' ? `\n${stack}` : ''
                            return `${String(timestamp)} ${level.toUpperCase().padEnd(5)} ${String(message)}${suffix}`
                        }),
                    ),
                }),
            ],
        })
    }

    debug(message: string, ...args: unknown[]): void {
        this.logger.debug(message + formatArgs(args))
    }

    info(message: string, ...args: unknown[]): void {
        this.logger.info(message + formatArgs(args))
    }

    warn(message: string, ...args: unknown[]): void {
        this.logger.warn(message + formatArgs(args))
    }

    error(message: string, ...args: unknown[]): void {
        this.logger.error(message + formatArgs(args))
    }
}

export class NullLogger implements Logger {
    readonly level: LogLevel = 'error'

    debug(): void {}

    info(): void {}

    warn(): void {}

    error(): void {}
}

export type LogEntry = {
    level: LogLevel
    message: string
    args: unknown[]
}

export class MemoryLogger implements Logger {
    readonly entries: LogEntry[] = []

    constructor(readonly level: LogLevel = 'debug') {}

    debug(message: string, ...args: unknown[]): void {
        this.entries.push({ level: 'debug', message, args })
    }

    info(message: string, ...args: unknown[]): void {
        this.entries.push({ level: 'info', message, args })
    }

    warn(message: string, ...args: unknown[]): void {
        this.entries.push({ level: 'warn', message, args })
    }

    error(message: string, ...args: unknown[]): void {
        this.entries.push({ level: 'error', message, args })
    }

    messages(level?: LogLevel): string[] {
        return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message)
    }
}

let fallbackLogger: Logger | undefined

export function getLogger(): Logger {
    const registered = Locator.current.getService(LoggerKey)

    if (registered) {
        return registered
    }

    if (!fallbackLogger) {
        fallbackLogger = new WinstonLogger()
    }

    return fallbackLogger
}

const sourceName = (source: object | string): string => {
    if (typeof source === 'string') {
        return source
    }

    return source.constructor?.name || 'Object'
}

/**
 * A logger scoped to `source`. The underlying logger is looked up on every
 * call so a resolver swap takes effect immediately.
 */
export function logFor(source: object | string): Logger {
    const prefix = `[${sourceName(source)}]`

    const write = (level: LogLevel, message: string, args: unknown[]) => {
        const target = getLogger()

        if (!isLevelEnabled(target.level, level)) {
            return
        }

        target[level](`${prefix} ${message}`, ...args)
    }

    return {
        get level() {
            return getLogger().level
        },
        debug: (message, ...args) => write('debug', message, args),
        info: (message, ...args) => write('info', message, args),
        warn: (message, ...args) => write('warn', message, args),
        error: (message, ...args) => write('error', message, args),
    }
}
