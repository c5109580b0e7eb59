import { z } from 'zod'
import { LOG_LEVELS } from '../shared/log.js'
import { DEFAULT_EXPIRY_MARGIN_SECONDS } from '../shared/constants.js'
import { type Env, type ValidatedEnv } from '../types/env.js'

const envSchema = z.object({
	QUESTRADE_REFRESH_TOKEN: z
		.string()
		.trim()
		.min(1, 'QUESTRADE_REFRESH_TOKEN cannot be empty')
		.optional(),

	QUESTRADE_PRACTICE: z
		.enum(['true', 'false', '1', '0'], {
			errorMap: () => ({
				message: "QUESTRADE_PRACTICE must be one of 'true', 'false', '1', '0'",
			}),
		})
		.default('false')
		.transform((value) => value === 'true' || value === '1'),

	QUESTRADE_EXPIRY_MARGIN_SECONDS: z.coerce
		.number()
		.int('QUESTRADE_EXPIRY_MARGIN_SECONDS must be a whole number')
		.nonnegative('QUESTRADE_EXPIRY_MARGIN_SECONDS cannot be negative')
		.default(DEFAULT_EXPIRY_MARGIN_SECONDS),

	LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

/**
 * Validates the environment, throwing one error that lists every issue
 */
export function buildConfig(env: Env): ValidatedEnv {
	const result = envSchema.safeParse(env)
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
			.join('\n')
		throw new Error(`Environment validation failed:\n${issues}`)
	}
	return Object.freeze(result.data)
}

// Memoized singleton config getter
export const getConfig = (() => {
	let cachedConfig: ValidatedEnv | null = null
	let cachedEnvHash: string | null = null

	return (env: Env): ValidatedEnv => {
		const envHash = JSON.stringify([
			env.QUESTRADE_REFRESH_TOKEN,
			env.QUESTRADE_PRACTICE,
			env.QUESTRADE_EXPIRY_MARGIN_SECONDS,
			env.LOG_LEVEL,
		])

		if (cachedConfig && cachedEnvHash === envHash) {
			return cachedConfig
		}

		cachedConfig = buildConfig(env)
		cachedEnvHash = envHash
		return cachedConfig
	}
})()
