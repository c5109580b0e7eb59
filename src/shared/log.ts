/**
 * Lightweight Pino logger wrapper
 * Provides structured logging with automatic secret redaction
 */

import pino from 'pino'

export const LOG_LEVELS = [
	'trace',
	'debug',
	'info',
	'warn',
	'error',
	'fatal',
	'silent',
] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type LogData = Record<string, unknown>

export interface AppLogger {
	debug: (message: string, data?: LogData) => void
	info: (message: string, data?: LogData) => void
	warn: (message: string, data?: LogData) => void
	error: (message: string, data?: LogData) => void
	child: (contextId: string) => AppLogger
	/** Applies to the logger it was built from and every child of it */
	setLevel: (level: LogLevel) => void
}

const SENSITIVE_KEYS = [
	'password',
	'secret',
	'token',
	'authorization',
	'cookie',
	'accessToken',
	'refreshToken',
	'access_token',
	'refresh_token',
	'accountNumber',
]

// Redaction paths for sensitive data, at the top level and one level down
const REDACT_PATHS = [
	...SENSITIVE_KEYS,
	...SENSITIVE_KEYS.map((key) => `*.${key}`),
]

const pinoConfig: pino.LoggerOptions = {
	redact: {
		paths: REDACT_PATHS,
		censor: '[REDACTED]',
	},
	serializers: {
		err: pino.stdSerializers.err,
		error: pino.stdSerializers.err,
	},
	timestamp: pino.stdTimeFunctions.isoTime,
	base: {
		app: 'questrade-client',
	},
}

function isLogLevel(value: string): value is LogLevel {
	const known: readonly string[] = LOG_LEVELS
	return known.includes(value)
}

/**
 * Resolves a log level name, falling back to `info` for unknown values
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
	const normalized = value?.trim().toLowerCase()
	return normalized && isLogLevel(normalized) ? normalized : 'info'
}

function wrap(base: pino.Logger, family: Set<pino.Logger>): AppLogger {
	family.add(base)
	const createLogFunction =
		(logFn: pino.LogFn) =>
		(message: string, data?: LogData): void => {
			if (data !== undefined) {
				logFn(data, message)
			} else {
				logFn(message)
			}
		}

	return {
		debug: createLogFunction(base.debug.bind(base)),
		info: createLogFunction(base.info.bind(base)),
		warn: createLogFunction(base.warn.bind(base)),
		error: createLogFunction(base.error.bind(base)),
		child: (contextId: string) => wrap(base.child({ contextId }), family),
		setLevel: (level: LogLevel) => {
			// pino children copy the level once, at creation
			for (const member of family) {
				member.level = level
			}
		},
	}
}

/**
 * Build a logger instance with the specified log level.
 *
 * Output goes to stderr: stdout is the protocol channel when running as an
 * MCP stdio server.
 */
export function buildLogger(
	level: LogLevel = 'info',
	destination: pino.DestinationStream = pino.destination(2),
): AppLogger {
	return wrap(pino({ ...pinoConfig, level }, destination), new Set())
}

// Entry points reconfigure this from validated config with setLevel
export const logger = buildLogger(resolveLogLevel(process.env.LOG_LEVEL))
