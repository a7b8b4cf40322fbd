/**
 * Lightweight Pino logger wrapper
 * Provides structured logging with automatic secret redaction
 */

import pino from 'pino'

export type PinoLogLevel =
	| 'trace'
	| 'debug'
	| 'info'
	| 'warn'
	| 'error'
	| 'fatal'
	| 'silent'

export type LogData = Record<string, unknown>

type LogFunction = (message: string, data?: LogData) => void

export interface AppLogger {
	debug: LogFunction
	info: LogFunction
	warn: LogFunction
	error: LogFunction
	child: (contextId: string) => AppLogger
}

const SENSITIVE_KEYS = [
	'secret',
	'token',
	'authorization',
	'cookie',
	'accessToken',
	'access_token',
	'apiSecret',
	'api_secret',
	'request_token',
	'requestToken',
	'checksum',
]

// Redaction paths for sensitive data
const REDACT_PATHS = [
	...SENSITIVE_KEYS,
	...SENSITIVE_KEYS.map((key) => `*.${key}`),
	'headers.Authorization',
	'*.headers.Authorization',
]

const pinoConfig: pino.LoggerOptions = {
	redact: {
		paths: REDACT_PATHS,
		censor: '[REDACTED]',
	},
	serializers: {
		err: pino.stdSerializers.err,
	},
	timestamp: pino.stdTimeFunctions.isoTime,
	base: {
		name: 'kite-wrapper',
	},
}

function wrap(base: pino.Logger): AppLogger {
	const createLogFunction = (logFn: pino.LogFn): LogFunction => {
		return (message: string, data?: LogData) => {
			if (data !== undefined) {
				logFn(data, message)
			} else {
				logFn(message)
			}
		}
	}

	return {
		debug: createLogFunction(base.debug.bind(base)),
		info: createLogFunction(base.info.bind(base)),
		warn: createLogFunction(base.warn.bind(base)),
		error: createLogFunction(base.error.bind(base)),
		child: (contextId: string) => wrap(base.child({ contextId })),
	}
}

/**
 * Build a logger instance with the specified log level.
 *
 * Every client builds its own instance; there is no process-wide logger to
 * reconfigure.
 */
export function buildLogger(
	level: PinoLogLevel = 'info',
	destination?: pino.DestinationStream,
): AppLogger {
	const base = destination
		? pino({ ...pinoConfig, level }, destination)
		: pino({ ...pinoConfig, level })
	return wrap(base)
}
