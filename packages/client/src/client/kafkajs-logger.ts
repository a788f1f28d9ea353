/**
 * Routes kafkajs log output into a Logger
 */

import { logLevel, type logCreator } from 'kafkajs'

import type { Logger, LogLevel } from '@/logger.js'

const KAFKAJS_LEVELS: Record<LogLevel, logLevel> = {
	silent: logLevel.NOTHING,
	error: logLevel.ERROR,
	warn: logLevel.WARN,
	info: logLevel.INFO,
	debug: logLevel.DEBUG,
}

export function toKafkaJsLogLevel(level: LogLevel): logLevel {
	return KAFKAJS_LEVELS[level]
}

export function createKafkaJsLogCreator(logger: Logger): logCreator {
	return () =>
		({ namespace, level, log }) => {
			const { message, timestamp: _timestamp, ...extra } = log
			const context: Record<string, unknown> = { namespace, ...extra }

			switch (level) {
				case logLevel.ERROR:
					logger.error(message, context)
					break
				case logLevel.WARN:
					logger.warn(message, context)
					break
				case logLevel.INFO:
					logger.info(message, context)
					break
				default:
					logger.debug(message, context)
			}
		}
}
