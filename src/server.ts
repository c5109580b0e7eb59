import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { type QuestradeClient } from './lib/questrade-api/client.js'
import { APP_NAME, APP_VERSION } from './shared/constants.js'
import { registerTools } from './tools/index.js'

export function createServer(client: QuestradeClient): McpServer {
	const server = new McpServer({
		name: APP_NAME,
		version: APP_VERSION,
	})
	registerTools(client, server)
	return server
}
