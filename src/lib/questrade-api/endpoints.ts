import { createEndpoint } from './http.js'
import {
	AccountBalancesSchema,
	AccountNumberPathSchema,
	AccountsResponseSchema,
	ActivitiesQuerySchema,
	ActivitiesResponseSchema,
	PositionsResponseSchema,
	TimeResponseSchema,
} from './schemas.js'

// --- Get Accounts ---
export const getAccounts = createEndpoint({
	path: '/accounts',
	method: 'GET',
	responseSchema: AccountsResponseSchema,
})

// --- Get Account Balances ---
export const getAccountBalances = createEndpoint({
	path: '/accounts/{accountNumber}/balances',
	method: 'GET',
	pathSchema: AccountNumberPathSchema,
	responseSchema: AccountBalancesSchema,
})

// --- Get Account Positions ---
export const getAccountPositions = createEndpoint({
	path: '/accounts/{accountNumber}/positions',
	method: 'GET',
	pathSchema: AccountNumberPathSchema,
	responseSchema: PositionsResponseSchema,
})

// --- Get Account Activities ---
export const getAccountActivities = createEndpoint({
	path: '/accounts/{accountNumber}/activities',
	method: 'GET',
	pathSchema: AccountNumberPathSchema,
	querySchema: ActivitiesQuerySchema,
	responseSchema: ActivitiesResponseSchema,
})

// --- Get Server Time ---
export const getServerTime = createEndpoint({
	path: '/time',
	method: 'GET',
	responseSchema: TimeResponseSchema,
})
