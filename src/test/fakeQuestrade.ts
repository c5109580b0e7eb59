import { vi } from 'vitest'
import { type FetchFn } from '../lib/questrade-api/types.js'

export const FAKE_API_SERVER = 'https://api01.iq.questrade.com'

export const ACCOUNTS = [
	{
		type: 'Margin',
		number: '11111111',
		status: 'Active',
		isPrimary: false,
		isBilling: false,
		clientAccountType: 'Joint',
	},
	{
		type: 'TFSA',
		number: '22222222',
		status: 'Active',
		isPrimary: true,
		isBilling: true,
		clientAccountType: 'Individual',
	},
]

const cadBalance = {
	currency: 'CAD',
	cash: 1250.5,
	marketValue: 8000,
	totalEquity: 9250.5,
	buyingPower: 1250.5,
	maintenanceExcess: 1250.5,
	isRealTime: false,
}

export const BALANCES = {
	perCurrencyBalances: [cadBalance],
	combinedBalances: [cadBalance],
	sodPerCurrencyBalances: [cadBalance],
	sodCombinedBalances: [cadBalance],
}

export const POSITIONS = [
	{
		symbol: 'XYZ.TO',
		symbolId: 4242,
		openQuantity: 100,
		closedQuantity: 0,
		currentMarketValue: 8000,
		currentPrice: 80,
		averageEntryPrice: 75,
		closedPnl: 0,
		openPnl: 500,
		totalCost: 7500,
		isRealTime: false,
		isUnderReorg: false,
	},
]

export const ACTIVITIES = [
	{
		tradeDate: '2024-03-01T00:00:00.000000-05:00',
		transactionDate: '2024-03-04T00:00:00.000000-05:00',
		settlementDate: '2024-03-04T00:00:00.000000-05:00',
		action: 'Buy',
		symbol: 'XYZ.TO',
		symbolId: 4242,
		description: 'XYZ TEST CORP',
		currency: 'CAD',
		quantity: 100,
		price: 75,
		grossAmount: -7500,
		commission: -4.95,
		netAmount: -7504.95,
		type: 'Trades',
	},
]

export const SERVER_TIME = '2024-03-05T10:15:30.123000-05:00'

export interface FakeQuestradeOptions {
	refreshToken?: string
	expiresIn?: number
	/** As the token endpoint reports it; may carry a trailing slash */
	apiServer?: string
}

function json(status: number, body: unknown): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { 'content-type': 'application/json' },
	})
}

/**
 * In-process stand-in for the Questrade token endpoint and REST API.
 *
 * Refresh tokens are single use: each successful exchange invalidates the
 * presented token and issues `refresh-<n>` / `access-<n>`.
 */
export function createFakeQuestrade(options: FakeQuestradeOptions = {}) {
	let validRefreshToken = options.refreshToken ?? 'refresh-0'
	const validAccessTokens = new Set<string>()
	let issued = 0
	const exchanges: string[] = []
	let pendingExchange: Promise<void> | null = null

	const handler = async (input: string, init?: RequestInit): Promise<Response> => {
		const url = new URL(input)

		if (url.pathname === '/oauth2/token') {
			const presented = url.searchParams.get('refresh_token') ?? ''
			exchanges.push(presented)
			if (pendingExchange) {
				await pendingExchange
			}
			if (
				init?.method !== 'POST' ||
				url.searchParams.get('grant_type') !== 'refresh_token' ||
				presented !== validRefreshToken
			) {
				return new Response('Bad Request', { status: 400 })
			}
			issued += 1
			validRefreshToken = `refresh-${issued}`
			const accessToken = `access-${issued}`
			validAccessTokens.add(accessToken)
			return json(200, {
				access_token: accessToken,
				token_type: 'Bearer',
				expires_in: options.expiresIn ?? 1800,
				refresh_token: validRefreshToken,
				api_server: options.apiServer ?? `${FAKE_API_SERVER}/`,
			})
		}

		const authorization = new Headers(init?.headers).get('authorization') ?? ''
		const accessToken = authorization.replace(/^Bearer /, '')
		if (!validAccessTokens.has(accessToken)) {
			return json(401, { code: 1017, message: 'Access token is invalid' })
		}

		const path = url.pathname
		if (path === '/v1/accounts') {
			return json(200, { accounts: ACCOUNTS })
		}
		if (path === '/v1/time') {
			return json(200, { time: SERVER_TIME })
		}

		const match = /^\/v1\/accounts\/([^/]+)\/(balances|positions|activities)$/.exec(path)
		if (match && ACCOUNTS.some((account) => account.number === match[1])) {
			switch (match[2]) {
				case 'balances':
					return json(200, BALANCES)
				case 'positions':
					return json(200, { positions: POSITIONS })
				case 'activities':
					return json(200, { activities: ACTIVITIES })
			}
		}
		return json(404, { code: 1001, message: 'Account not found' })
	}

	const fetch = vi.fn<FetchFn>(handler)

	return {
		fetch,
		/** Refresh tokens presented to the token endpoint, in order */
		exchanges,
		get currentRefreshToken() {
			return validRefreshToken
		},
		revoke(accessToken: string) {
			validAccessTokens.delete(accessToken)
		},
		/** Holds token responses until the returned release function is called */
		holdExchanges(): () => void {
			let release: () => void = () => undefined
			pendingExchange = new Promise<void>((resolve) => {
				release = () => {
					pendingExchange = null
					resolve()
				}
			})
			return release
		},
		apiCalls(): string[] {
			return fetch.mock.calls
				.map(([input]) => new URL(input).pathname)
				.filter((path) => path !== '/oauth2/token')
		},
	}
}
