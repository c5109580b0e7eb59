/**
 * Refresh-token exchange against the Questrade OAuth endpoint
 */

import { LOGGER_CONTEXTS, TOKEN_ENDPOINTS } from '../../shared/constants.js'
import { logger } from '../../shared/log.js'
import { AuthError, errorMessage } from './errors.js'
import { TokenResponseSchema } from './schemas.js'
import { type FetchFn, type Session } from './types.js'

const log = logger.child(LOGGER_CONTEXTS.TOKEN_EXCHANGE)

export function tokenEndpoint(isPractice: boolean): string {
	return isPractice ? TOKEN_ENDPOINTS.PRACTICE : TOKEN_ENDPOINTS.LIVE
}

/**
 * Exchanges a refresh token for a new session.
 *
 * The refresh token is consumed by the provider on success; only the
 * returned `session.refreshToken` is valid afterwards.
 */
export async function exchangeRefreshToken(
	refreshToken: string,
	isPractice: boolean,
	fetchFn: FetchFn,
	now: () => number = Date.now,
): Promise<Session> {
	if (!refreshToken.trim()) {
		throw new AuthError('TokenRejected', 'Refresh token cannot be empty')
	}

	const url = new URL(tokenEndpoint(isPractice))
	url.searchParams.set('grant_type', 'refresh_token')
	url.searchParams.set('refresh_token', refreshToken)

	let response: Response
	try {
		log.debug('Exchanging refresh token', { isPractice })
		response = await fetchFn(url.toString(), {
			method: 'POST',
			headers: { Accept: 'application/json' },
		})
	} catch (error) {
		log.error('Token endpoint unreachable', { error: errorMessage(error) })
		throw new AuthError(
			'Unreachable',
			`Token endpoint unreachable: ${errorMessage(error)}`,
			{ cause: error },
		)
	}

	if (!response.ok) {
		const body = await response.text().catch(() => '')
		log.warn('Refresh token rejected', { status: response.status })
		throw new AuthError(
			'TokenRejected',
			`Refresh token rejected with status ${response.status}${body ? `: ${body}` : ''}`,
			{ status: response.status },
		)
	}

	let json: unknown
	try {
		json = await response.json()
	} catch (error) {
		throw new AuthError('MalformedResponse', 'Token response is not valid JSON', {
			status: response.status,
			cause: error,
		})
	}

	const parsed = TokenResponseSchema.safeParse(json)
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
			.join('; ')
		throw new AuthError('MalformedResponse', `Invalid token response: ${issues}`, {
			status: response.status,
			cause: parsed.error,
		})
	}

	const token = parsed.data
	const session: Session = {
		accessToken: token.access_token,
		refreshToken: token.refresh_token,
		tokenType: token.token_type,
		expiresAt: now() + token.expires_in * 1000,
		apiServer: token.api_server.replace(/\/+$/, ''),
		isPractice,
	}

	log.info('Refresh token exchanged', {
		apiServer: session.apiServer,
		expiresIn: token.expires_in,
	})
	return session
}
