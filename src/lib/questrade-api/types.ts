/**
 * Types for the Questrade API client
 */

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>

/**
 * Authenticated state returned by a refresh-token exchange.
 *
 * The refresh token is single use: every exchange consumes it and the
 * provider hands back its replacement here.
 */
export interface Session {
	accessToken: string
	refreshToken: string
	tokenType: string
	/** Epoch milliseconds */
	expiresAt: number
	/** API root, without a trailing slash */
	apiServer: string
	isPractice: boolean
}

export interface SessionManagerOptions {
	fetch?: FetchFn
	/** Treat the access token as expired this many ms before it actually is */
	expiryMarginMs?: number
	now?: () => number
	/** Seed the manager with a session obtained elsewhere */
	session?: Session
}

export type QuestradeClientOptions = SessionManagerOptions

/**
 * What an endpoint call needs from the session
 */
export interface RequestContext {
	apiServer: string
	accessToken: string
	fetch: FetchFn
}

export const defaultFetch: FetchFn = (input, init) => fetch(input, init)
