import { z } from 'zod'

// --- OAuth ---

export const TokenResponseSchema = z.object({
	access_token: z.string().min(1),
	token_type: z.string().min(1).default('Bearer'),
	expires_in: z.number().int().positive(),
	refresh_token: z.string().min(1),
	api_server: z.string().url(),
})
export type TokenResponse = z.infer<typeof TokenResponseSchema>

// --- Accounts ---

export const AccountType = z.enum([
	'Cash',
	'Margin',
	'TFSA',
	'RRSP',
	'SRRSP',
	'LRRSP',
	'LIRA',
	'LIF',
	'RIF',
	'SRIF',
	'LRIF',
	'RRIF',
	'PRIF',
	'RESP',
	'FRESP',
])
export type AccountType = z.infer<typeof AccountType>

export const AccountStatus = z.enum([
	'Active',
	'Suspended (Closed)',
	'Suspended (View Only)',
	'Liquidate Only',
	'Closed',
])
export type AccountStatus = z.infer<typeof AccountStatus>

export const ClientAccountType = z.enum([
	'Individual',
	'Joint',
	'Informal Trust',
	'Corporation',
	'Investment Club',
	'Formal Trust',
	'Partnership',
	'Sole Proprietorship',
	'Family',
	'Joint and Informal Trust',
	'Institution',
])
export type ClientAccountType = z.infer<typeof ClientAccountType>

export const AccountSchema = z.object({
	type: AccountType,
	number: z.string().min(1),
	status: AccountStatus,
	isPrimary: z.boolean(),
	isBilling: z.boolean(),
	clientAccountType: ClientAccountType,
})
export type Account = z.infer<typeof AccountSchema>

export const AccountsResponseSchema = z.object({
	accounts: z.array(AccountSchema),
})

// --- Balances ---

export const Currency = z.enum(['CAD', 'USD'])
export type Currency = z.infer<typeof Currency>

export const BalanceSchema = z.object({
	currency: Currency,
	cash: z.number(),
	marketValue: z.number(),
	totalEquity: z.number(),
	buyingPower: z.number(),
	maintenanceExcess: z.number(),
	isRealTime: z.boolean(),
})
export type Balance = z.infer<typeof BalanceSchema>

export const AccountBalancesSchema = z.object({
	perCurrencyBalances: z.array(BalanceSchema),
	combinedBalances: z.array(BalanceSchema),
	sodPerCurrencyBalances: z.array(BalanceSchema),
	sodCombinedBalances: z.array(BalanceSchema),
})
export type AccountBalances = z.infer<typeof AccountBalancesSchema>

// --- Positions ---

export const PositionSchema = z.object({
	symbol: z.string(),
	symbolId: z.number().int(),
	openQuantity: z.number(),
	closedQuantity: z.number(),
	currentMarketValue: z.number().nullable(),
	currentPrice: z.number().nullable(),
	averageEntryPrice: z.number().nullable(),
	// PnL and cost are null while a position has no pricing yet
	closedPnl: z.number().nullable(),
	openPnl: z.number().nullable(),
	totalCost: z.number().nullable(),
	isRealTime: z.boolean(),
	isUnderReorg: z.boolean(),
})
export type Position = z.infer<typeof PositionSchema>

export const PositionsResponseSchema = z.object({
	positions: z.array(PositionSchema),
})

// --- Activities ---

export const ActivitySchema = z.object({
	tradeDate: z.string(),
	transactionDate: z.string(),
	settlementDate: z.string(),
	action: z.string(),
	symbol: z.string(),
	symbolId: z.number().int(),
	description: z.string(),
	currency: z.string(),
	quantity: z.number(),
	price: z.number(),
	grossAmount: z.number(),
	commission: z.number(),
	netAmount: z.number(),
	type: z.string(),
})
export type Activity = z.infer<typeof ActivitySchema>

export const ActivitiesResponseSchema = z.object({
	activities: z.array(ActivitySchema),
})

// --- Time ---

export const TimeResponseSchema = z.object({
	time: z.string().datetime({ offset: true }),
})

// --- Request parameters ---

export const AccountNumberPathSchema = z.object({
	accountNumber: z
		.string()
		.trim()
		.min(1, 'accountNumber cannot be empty')
		// URL parsing would collapse these into the parent path
		.refine((value) => value !== '.' && value !== '..', {
			message: 'accountNumber cannot be a dot segment',
		}),
})

export const ActivitiesQuerySchema = z
	.object({
		startTime: z.string().datetime({ offset: true }),
		endTime: z.string().datetime({ offset: true }),
	})
	.refine((q) => Date.parse(q.startTime) <= Date.parse(q.endTime), {
		message: 'startTime must not be after endTime',
		path: ['startTime'],
	})
