import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { type z } from 'zod'
import { type QuestradeClient } from '../lib/questrade-api/client.js'
import {
	errorMessage,
	isApiError,
	isAuthError,
} from '../lib/questrade-api/errors.js'
import { LOGGER_CONTEXTS } from './constants.js'
import { logger } from './log.js'

const log = logger.child(LOGGER_CONTEXTS.TOOLS)

export type ToolResponse<T = unknown> =
	| { ok: true; data: T; message?: string }
	| { ok: false; error: Error; details?: Record<string, unknown> }

export type ToolHandler<S extends z.AnyZodObject> = (
	input: z.output<S>,
	client: QuestradeClient,
) => Promise<ToolResponse>

type McpTextContent = { type: 'text'; text: string }

export type McpToolResult = {
	content: McpTextContent[]
	isError?: boolean
}

export function formatResponse(response: ToolResponse): McpToolResult {
	if (response.ok) {
		return {
			content: [
				{ type: 'text', text: response.message ?? 'Operation successful' },
				{ type: 'text', text: JSON.stringify(response.data, null, 2) },
			],
		}
	}

	const content: McpTextContent[] = [{ type: 'text', text: response.error.message }]
	const details: Record<string, unknown> = response.details ?? {}
	const { kind, status } = details
	if (kind !== undefined || status !== undefined) {
		content.push({
			type: 'text',
			text: `Diagnostic Info: ${JSON.stringify({ kind, status })}`,
		})
	}
	return { content, isError: true }
}

export function toolError(
	error: unknown,
	details?: Record<string, unknown>,
): ToolResponse {
	const err = error instanceof Error ? error : new Error(errorMessage(error))
	let enhancedDetails: Record<string, unknown> = { ...details }
	if (isApiError(err) || isAuthError(err)) {
		enhancedDetails = {
			...enhancedDetails,
			kind: err.kind,
			status: err.status,
		}
	}
	log.error('Tool error', {
		message: err.message,
		details: enhancedDetails,
	})
	return { ok: false, error: err, details: enhancedDetails }
}

export function toolSuccess<T>({
	data,
	message,
	source,
}: {
	data: T
	message?: string
	source: string
}): ToolResponse<T> {
	const count = Array.isArray(data) ? data.length : 1
	log.debug(`Tool success: ${source}`, { count })
	return { ok: true, data, message }
}

/**
 * Registers a tool whose input is validated with `schema` before `handler`
 * runs. Handler failures come back as an `isError` result, never a throw.
 */
export function createTool<S extends z.AnyZodObject>(
	client: QuestradeClient,
	server: McpServer,
	{
		name,
		description,
		schema,
		handler,
	}: {
		name: string
		description: string
		schema: S
		handler: ToolHandler<S>
	},
) {
	const shape: z.ZodRawShape = schema.shape
	server.tool(name, description, shape, async (args: unknown) => {
		const parsed = schema.safeParse(args)
		if (!parsed.success) {
			const issues = parsed.error.issues
				.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
				.join('; ')
			return formatResponse(
				toolError(new Error(`Invalid input for ${name}: ${issues}`), {
					source: name,
				}),
			)
		}

		try {
			log.info(`Invoking tool: ${name}`)
			return formatResponse(await handler(parsed.data, client))
		} catch (error) {
			return formatResponse(toolError(error, { source: name }))
		}
	})
	log.debug(`Registered tool '${name}'`)
}
