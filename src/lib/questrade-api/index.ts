/**
 * Questrade API Client - Main Export
 */

export * from './types.js'
export * from './errors.js'
export * from './schemas.js'
export * from './auth.js'
export * from './sessionManager.js'
export * from './http.js'
export * from './endpoints.js'
export * from './client.js'

import { QuestradeClient } from './client.js'
import { type QuestradeClientOptions, type Session } from './types.js'

/**
 * Create a client and authenticate it with the given refresh token
 */
export async function createQuestradeClient(
	refreshToken: string,
	isPractice = false,
	options: QuestradeClientOptions = {},
): Promise<{ client: QuestradeClient; session: Session }> {
	const client = new QuestradeClient(options)
	const session = await client.authenticate(refreshToken, isPractice)
	return { client, session }
}
