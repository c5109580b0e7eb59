import { type LogLevel } from '../shared/log.js'

/**
 * Environment variables read by the Questrade MCP server
 *
 * This is the single source of truth for environment variable definitions.
 * In runtime, these variables are validated and accessed through getConfig.
 */
export interface Env {
	/**
	 * Refresh token generated in the Questrade API hub. Single use: it is
	 * consumed by the first exchange.
	 */
	QUESTRADE_REFRESH_TOKEN?: string

	/**
	 * `true` to authenticate against the practice (demo) login endpoint
	 */
	QUESTRADE_PRACTICE?: string

	/**
	 * Seconds before expiry at which the access token is refreshed
	 */
	QUESTRADE_EXPIRY_MARGIN_SECONDS?: string

	/**
	 * Optional log level for application logging
	 */
	LOG_LEVEL?: string
}

export interface ValidatedEnv {
	readonly QUESTRADE_REFRESH_TOKEN?: string
	readonly QUESTRADE_PRACTICE: boolean
	readonly QUESTRADE_EXPIRY_MARGIN_SECONDS: number
	readonly LOG_LEVEL: LogLevel
}
