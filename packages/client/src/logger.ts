/**
 * Structured JSON logging
 *
 * Clients take either a Logger or a LogLevel; kafkajs output is routed into
 * the same logger (see client/kafkajs-logger.ts).
 */

/**
 * Log levels supported by the logger
 * 'silent' disables all logging
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	silent: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
}

type LogMethod = (message: string, context?: Record<string, unknown>) => void

/**
 * Logger interface for structured logging
 */
export interface Logger {
	error: LogMethod
	warn: LogMethod
	info: LogMethod
	debug: LogMethod

	/**
	 * Create a child logger with additional default context
	 */
	child(defaultContext: Record<string, unknown>): Logger
}

/**
 * One JSON line per entry; errors go to stderr
 */
class JsonLogger implements Logger {
	private readonly threshold: number

	constructor(
		private readonly level: LogLevel,
		private readonly defaultContext: Record<string, unknown>
	) {
		this.threshold = LOG_LEVEL_VALUES[level]
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.write('error', message, context)
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.write('warn', message, context)
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.write('info', message, context)
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.write('debug', message, context)
	}

	child(defaultContext: Record<string, unknown>): Logger {
		return new JsonLogger(this.level, { ...this.defaultContext, ...defaultContext })
	}

	private write(level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void {
		if (LOG_LEVEL_VALUES[level] > this.threshold) {
			return
		}

		const line = JSON.stringify({
			level,
			message,
			timestamp: new Date().toISOString(),
			...this.defaultContext,
			...context,
		})

		if (level === 'error') {
			console.error(line)
		} else {
			console.log(line)
		}
	}
}

const discard: LogMethod = () => {}

/**
 * Logger that discards everything
 */
export const noopLogger: Logger = {
	error: discard,
	warn: discard,
	info: discard,
	debug: discard,
	child: () => noopLogger,
}

/**
 * Create a JSON console logger
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', { service: 'billing' })
 * logger.info('started')
 * // {"level":"info","message":"started","timestamp":"...","service":"billing"}
 * ```
 */
export function createLogger(level: LogLevel, defaultContext: Record<string, unknown> = {}): Logger {
	return level === 'silent' ? noopLogger : new JsonLogger(level, defaultContext)
}

/**
 * Logging options accepted by every client
 */
export interface LoggingOptions {
	/** Logger instance (takes precedence over logLevel) */
	logger?: Logger
	/** Log level for the default JSON logger (default: 'silent') */
	logLevel?: LogLevel
}

/**
 * Pick the logger a client should use and tag it with the client's context
 */
export function resolveLogger(options: LoggingOptions, context: Record<string, unknown>): Logger {
	if (options.logger) {
		return options.logger.child(context)
	}
	return createLogger(options.logLevel ?? 'silent', context)
}
