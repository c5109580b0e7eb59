import {
	DEFAULT_EXPIRY_MARGIN_SECONDS,
	LOGGER_CONTEXTS,
} from '../../shared/constants.js'
import { logger } from '../../shared/log.js'
import { exchangeRefreshToken } from './auth.js'
import { AuthError, errorMessage } from './errors.js'
import {
	defaultFetch,
	type FetchFn,
	type Session,
	type SessionManagerOptions,
} from './types.js'

type ExchangeReason = 'authenticate' | 'refresh'

/**
 * Owns the session shared by every call made through one client.
 *
 * Refresh-token exchanges are mutually exclusive: at most one is in flight,
 * and callers that find the token expired while one is running wait for it
 * instead of starting their own. A duplicate exchange would consume the
 * refresh token the first one is still relying on.
 */
export class SessionManager {
	private session: Session | null
	private exchange: Promise<Session> | null = null
	private readonly fetchFn: FetchFn
	private readonly expiryMarginMs: number
	private readonly now: () => number
	private readonly log = logger.child(LOGGER_CONTEXTS.SESSION)

	constructor(options: SessionManagerOptions = {}) {
		this.fetchFn = options.fetch ?? defaultFetch
		this.expiryMarginMs =
			options.expiryMarginMs ?? DEFAULT_EXPIRY_MARGIN_SECONDS * 1000
		this.now = options.now ?? Date.now
		this.session = options.session ? { ...options.session } : null
	}

	/**
	 * Exchanges `refreshToken` and makes the result the current session.
	 *
	 * Waits for any exchange already in flight. On failure the previous
	 * session, if any, is left as it was.
	 */
	authenticate(refreshToken: string, isPractice: boolean): Promise<Session> {
		return this.runExchange(refreshToken, isPractice, 'authenticate')
	}

	/**
	 * Returns a session whose access token is usable now, exchanging the held
	 * refresh token first if it has expired.
	 *
	 * An exchange in flight is only waited for when there is no usable
	 * session, so a failing `authenticate` does not fail calls that still hold
	 * a valid token.
	 */
	async ensureValid(): Promise<Session> {
		const current = this.session
		if (current && !this.isExpired(current)) {
			return { ...current }
		}

		if (this.exchange) {
			return this.exchange
		}

		if (!current) {
			throw new AuthError(
				'NotAuthenticated',
				'Not authenticated: call authenticate() with a refresh token first',
			)
		}

		this.log.info('Access token expired, exchanging refresh token', {
			expiredAt: new Date(current.expiresAt).toISOString(),
		})
		return this.runExchange(current.refreshToken, current.isPractice, 'refresh')
	}

	getSession(): Session | null {
		return this.session ? { ...this.session } : null
	}

	/**
	 * Marks the session expired after the server rejected `accessToken`.
	 * Ignored when that token has already been replaced.
	 */
	expire(accessToken: string): void {
		if (this.session?.accessToken !== accessToken) return
		this.log.warn('Access token rejected by server, marking session expired')
		this.session = { ...this.session, expiresAt: 0 }
	}

	clear(): void {
		this.session = null
	}

	private isExpired(session: Session): boolean {
		return this.now() + this.expiryMarginMs >= session.expiresAt
	}

	private runExchange(
		refreshToken: string,
		isPractice: boolean,
		reason: ExchangeReason,
	): Promise<Session> {
		const previous = this.exchange

		const run = async (): Promise<Session> => {
			if (previous) {
				// The previous exchange reports its own failure to its callers
				await previous.then(
					() => undefined,
					() => undefined,
				)
			}

			try {
				const next = await exchangeRefreshToken(
					refreshToken,
					isPractice,
					this.fetchFn,
					this.now,
				)
				this.session = next
				return { ...next }
			} catch (error) {
				this.log.error(`Token exchange failed during ${reason}`, {
					error: errorMessage(error),
				})
				if (reason === 'refresh') {
					this.session = null
				}
				throw error
			}
		}

		const tracked: Promise<Session> = run().finally(() => {
			if (this.exchange === tracked) {
				this.exchange = null
			}
		})
		this.exchange = tracked
		return tracked
	}
}
