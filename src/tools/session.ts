import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { z } from 'zod'
import { type QuestradeClient } from '../lib/questrade-api/client.js'
import { TOOL_NAMES } from '../shared/constants.js'
import { createTool, toolError, toolSuccess } from '../shared/toolBuilder.js'

export function registerSessionTools(client: QuestradeClient, server: McpServer) {
	createTool(client, server, {
		name: TOOL_NAMES.STATUS,
		description: 'Report whether the server holds a Questrade session',
		schema: z.object({}),
		handler: async (_params, client) => {
			const session = client.getSession()
			return toolSuccess({
				data: session
					? {
							authenticated: true,
							isPractice: session.isPractice,
							apiServer: session.apiServer,
							expiresAt: new Date(session.expiresAt).toISOString(),
						}
					: { authenticated: false },
				message: session ? 'Session active' : 'Not authenticated',
				source: TOOL_NAMES.STATUS,
			})
		},
	})

	createTool(client, server, {
		name: TOOL_NAMES.GET_SERVER_TIME,
		description: 'Get the current Questrade server time',
		schema: z.object({}),
		handler: async (_params, client) => {
			try {
				const time = await client.time()
				return toolSuccess({
					data: { time: time.toISOString() },
					message: 'Successfully fetched server time',
					source: TOOL_NAMES.GET_SERVER_TIME,
				})
			} catch (error) {
				return toolError(error, { source: TOOL_NAMES.GET_SERVER_TIME })
			}
		},
	})
}
