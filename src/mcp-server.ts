#!/usr/bin/env node
import 'dotenv/config'
import { invariant } from '@epic-web/invariant'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { getConfig } from './config/index.js'
import { QuestradeClient } from './lib/questrade-api/client.js'
import { createServer } from './server.js'
import { LOGGER_CONTEXTS } from './shared/constants.js'
import { logger } from './shared/log.js'

const log = logger.child(LOGGER_CONTEXTS.SERVER)

async function main() {
	const config = getConfig(process.env)
	logger.setLevel(config.LOG_LEVEL)
	invariant(
		config.QUESTRADE_REFRESH_TOKEN,
		'QUESTRADE_REFRESH_TOKEN is required to start the server',
	)

	const client = new QuestradeClient({
		expiryMarginMs: config.QUESTRADE_EXPIRY_MARGIN_SECONDS * 1000,
	})
	const session = await client.authenticate(
		config.QUESTRADE_REFRESH_TOKEN,
		config.QUESTRADE_PRACTICE,
	)
	// The configured refresh token is spent now; rotated tokens live in memory only
	log.info('Authenticated with Questrade', {
		apiServer: session.apiServer,
		isPractice: session.isPractice,
	})

	const server = createServer(client)
	await server.connect(new StdioServerTransport())
	log.info('MCP server connected via stdio transport')
}

main().catch((error: unknown) => {
	log.error('Failed to start MCP server', {
		error: error instanceof Error ? error.message : String(error),
	})
	process.exit(1)
})
