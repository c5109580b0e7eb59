/**
 * Questrade API Client - caller-facing facade over the session and endpoints
 */

import { LOGGER_CONTEXTS } from '../../shared/constants.js'
import { logger } from '../../shared/log.js'
import {
	getAccountActivities,
	getAccountBalances,
	getAccountPositions,
	getAccounts,
	getServerTime,
} from './endpoints.js'
import { ApiError, isApiError } from './errors.js'
import {
	type Account,
	type AccountBalances,
	type Activity,
	type Position,
} from './schemas.js'
import { SessionManager } from './sessionManager.js'
import {
	defaultFetch,
	type FetchFn,
	type QuestradeClientOptions,
	type RequestContext,
	type Session,
} from './types.js'

// Runs before the session is checked or refreshed
function toTimestamp(date: Date, name: string): string {
	if (Number.isNaN(date.getTime())) {
		throw new ApiError('InvalidRequest', 400, `Invalid ${name}: not a valid date`)
	}
	return date.toISOString()
}

export class QuestradeClient {
	private readonly sessions: SessionManager
	private readonly fetchFn: FetchFn
	private readonly log = logger.child(LOGGER_CONTEXTS.CLIENT)

	constructor(options: QuestradeClientOptions = {}) {
		this.fetchFn = options.fetch ?? defaultFetch
		this.sessions = new SessionManager({ ...options, fetch: this.fetchFn })
	}

	/**
	 * Authenticates using the supplied refresh token, replacing any current
	 * session. The token is consumed; keep `session.refreshToken` from the
	 * result if the session must outlive this client.
	 */
	authenticate(refreshToken: string, isPractice = false): Promise<Session> {
		return this.sessions.authenticate(refreshToken, isPractice)
	}

	/**
	 * Retrieves the current session (if set) without refreshing it
	 */
	getSession(): Session | null {
		return this.sessions.getSession()
	}

	/**
	 * List all accounts associated with the authenticated user, in the order
	 * the provider returns them.
	 */
	async accounts(): Promise<Account[]> {
		const response = await this.call((context) => getAccounts(context))
		return response.accounts
	}

	/**
	 * Retrieves per-currency and combined balances for a specified account.
	 */
	accountBalance(accountNumber: string): Promise<AccountBalances> {
		return this.call((context) =>
			getAccountBalances(context, { pathParams: { accountNumber } }),
		)
	}

	/**
	 * Retrieves positions in a specified account.
	 */
	async accountPositions(accountNumber: string): Promise<Position[]> {
		const response = await this.call((context) =>
			getAccountPositions(context, { pathParams: { accountNumber } }),
		)
		return response.positions
	}

	/**
	 * Retrieve account activities, including cash transactions, dividends,
	 * trades, etc.
	 */
	async accountActivities(
		accountNumber: string,
		startTime: Date,
		endTime: Date,
	): Promise<Activity[]> {
		const queryParams = {
			startTime: toTimestamp(startTime, 'startTime'),
			endTime: toTimestamp(endTime, 'endTime'),
		}
		const response = await this.call((context) =>
			getAccountActivities(context, {
				pathParams: { accountNumber },
				queryParams,
			}),
		)
		return response.activities
	}

	/**
	 * Retrieves current server time.
	 */
	async time(): Promise<Date> {
		const response = await this.call((context) => getServerTime(context))
		return new Date(response.time)
	}

	private async call<T>(
		invoke: (context: RequestContext) => Promise<T>,
	): Promise<T> {
		const session = await this.sessions.ensureValid()
		try {
			return await invoke({
				apiServer: session.apiServer,
				accessToken: session.accessToken,
				fetch: this.fetchFn,
			})
		} catch (error) {
			if (isApiError(error) && error.kind === 'Unauthorized') {
				this.log.warn('Request unauthorized; re-authentication required', {
					status: error.status,
				})
				this.sessions.expire(session.accessToken)
			}
			throw error
		}
	}
}
