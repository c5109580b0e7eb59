import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { type QuestradeClient } from '../lib/questrade-api/client.js'
import { registerAccountTools } from './accounts.js'
import { registerSessionTools } from './session.js'

export function registerTools(client: QuestradeClient, server: McpServer) {
	registerSessionTools(client, server)
	registerAccountTools(client, server)
}
