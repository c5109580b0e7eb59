/**
 * Application Constants
 */
export const APP_NAME = 'Questrade MCP' as const
export const APP_VERSION = '0.1.0' as const

/**
 * Questrade OAuth token endpoints
 */
export const TOKEN_ENDPOINTS = {
	LIVE: 'https://login.questrade.com/oauth2/token',
	PRACTICE: 'https://practicelogin.questrade.com/oauth2/token',
} as const

export const API_VERSION = 'v1' as const

/**
 * Default seconds before expiry at which an access token is treated as expired
 */
export const DEFAULT_EXPIRY_MARGIN_SECONDS = 30

/**
 * Logger Context Names
 */
export const LOGGER_CONTEXTS = {
	TOKEN_EXCHANGE: 'token-exchange',
	SESSION: 'session-manager',
	HTTP: 'questrade-http',
	CLIENT: 'questrade-client',
	TOOLS: 'mcp-tools',
	SERVER: 'mcp-server',
	CONFIG: 'config',
} as const

/**
 * MCP Tool Names
 */
export const TOOL_NAMES = {
	STATUS: 'status',
	GET_ACCOUNTS: 'getAccounts',
	GET_ACCOUNT_BALANCES: 'getAccountBalances',
	GET_ACCOUNT_POSITIONS: 'getAccountPositions',
	GET_ACCOUNT_ACTIVITIES: 'getAccountActivities',
	GET_SERVER_TIME: 'getServerTime',
} as const
