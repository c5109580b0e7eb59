import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { z } from 'zod'
import { type QuestradeClient } from '../lib/questrade-api/client.js'
import { TOOL_NAMES } from '../shared/constants.js'
import { logger } from '../shared/log.js'
import { createTool, toolError, toolSuccess } from '../shared/toolBuilder.js'

const AccountNumberParams = z.object({
	accountNumber: z
		.string()
		.trim()
		.min(1)
		.describe('Account number as returned by getAccounts'),
})

const AccountActivitiesParams = AccountNumberParams.extend({
	startTime: z
		.string()
		.datetime({ offset: true })
		.describe('Start of the range, ISO 8601'),
	endTime: z
		.string()
		.datetime({ offset: true })
		.describe('End of the range, ISO 8601'),
})

export function registerAccountTools(client: QuestradeClient, server: McpServer) {
	createTool(client, server, {
		name: TOOL_NAMES.GET_ACCOUNTS,
		description: 'List the accounts of the authenticated Questrade user',
		schema: z.object({}),
		handler: async (_params, client) => {
			try {
				const accounts = await client.accounts()
				return toolSuccess({
					data: accounts,
					message:
						accounts.length > 0
							? 'Successfully fetched Questrade accounts'
							: 'No Questrade accounts found',
					source: TOOL_NAMES.GET_ACCOUNTS,
				})
			} catch (error) {
				return toolError(error, { source: TOOL_NAMES.GET_ACCOUNTS })
			}
		},
	})

	createTool(client, server, {
		name: TOOL_NAMES.GET_ACCOUNT_BALANCES,
		description: 'Get per-currency and combined balances for an account',
		schema: AccountNumberParams,
		handler: async ({ accountNumber }, client) => {
			try {
				const balances = await client.accountBalance(accountNumber)
				return toolSuccess({
					data: balances,
					message: 'Successfully fetched account balances',
					source: TOOL_NAMES.GET_ACCOUNT_BALANCES,
				})
			} catch (error) {
				return toolError(error, { source: TOOL_NAMES.GET_ACCOUNT_BALANCES })
			}
		},
	})

	createTool(client, server, {
		name: TOOL_NAMES.GET_ACCOUNT_POSITIONS,
		description: 'Get the positions held in an account',
		schema: AccountNumberParams,
		handler: async ({ accountNumber }, client) => {
			try {
				const positions = await client.accountPositions(accountNumber)
				return toolSuccess({
					data: positions,
					message:
						positions.length > 0
							? 'Successfully fetched account positions'
							: 'No positions found',
					source: TOOL_NAMES.GET_ACCOUNT_POSITIONS,
				})
			} catch (error) {
				return toolError(error, { source: TOOL_NAMES.GET_ACCOUNT_POSITIONS })
			}
		},
	})

	createTool(client, server, {
		name: TOOL_NAMES.GET_ACCOUNT_ACTIVITIES,
		description:
			'Get account activities (trades, dividends, cash movements) in a time range',
		schema: AccountActivitiesParams,
		handler: async ({ accountNumber, startTime, endTime }, client) => {
			try {
				const activities = await client.accountActivities(
					accountNumber,
					new Date(startTime),
					new Date(endTime),
				)
				return toolSuccess({
					data: activities,
					message:
						activities.length > 0
							? 'Successfully fetched account activities'
							: 'No activities found in range',
					source: TOOL_NAMES.GET_ACCOUNT_ACTIVITIES,
				})
			} catch (error) {
				return toolError(error, { source: TOOL_NAMES.GET_ACCOUNT_ACTIVITIES })
			}
		},
	})

	logger.debug('Account tools registered')
}
