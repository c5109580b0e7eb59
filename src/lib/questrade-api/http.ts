import { type z } from 'zod'
import { API_VERSION, LOGGER_CONTEXTS } from '../../shared/constants.js'
import { logger } from '../../shared/log.js'
import { ApiError, apiErrorKindForStatus, errorMessage } from './errors.js'
import { type RequestContext } from './types.js'

const log = logger.child(LOGGER_CONTEXTS.HTTP)

// --- Core Types ---

export type HttpMethod = 'GET'

type ParamValue = string | number | boolean | undefined
export type ParamRecord = Record<string, ParamValue>

/** Schema for path or query parameters: any input, a flat record out */
export type ParamSchema = z.ZodType<ParamRecord, z.ZodTypeDef, unknown>

export type InferParams<S> = S extends ParamSchema ? z.input<S> : undefined

// Metadata structure for each endpoint
export interface EndpointMetadata<
	PathSchema extends ParamSchema | undefined = undefined,
	QuerySchema extends ParamSchema | undefined = undefined,
	ResponseSchema extends z.ZodTypeAny = z.ZodTypeAny,
> {
	/** Path below the API version, e.g. `/accounts/{accountNumber}/balances` */
	path: string
	method: HttpMethod
	pathSchema?: PathSchema
	querySchema?: QuerySchema
	responseSchema: ResponseSchema
}

export interface EndpointRequestOptions<P = unknown, Q = unknown> {
	pathParams?: P
	queryParams?: Q
	signal?: AbortSignal
}

/**
 * Creates a typed function calling one Questrade endpoint.
 * @param meta The metadata object describing the endpoint (path, method, schemas).
 * @returns An async function taking the request context and parameters, returning the parsed response.
 */
export function createEndpoint<
	PathSchema extends ParamSchema | undefined = undefined,
	QuerySchema extends ParamSchema | undefined = undefined,
	ResponseSchema extends z.ZodTypeAny = z.ZodTypeAny,
>(meta: EndpointMetadata<PathSchema, QuerySchema, ResponseSchema>) {
	return (
		context: RequestContext,
		options: EndpointRequestOptions<
			InferParams<PathSchema>,
			InferParams<QuerySchema>
		> = {},
	): Promise<z.output<ResponseSchema>> =>
		questradeFetch(context, meta, options)
}

function invalidRequest(
	endpoint: string,
	what: string,
	error: z.ZodError,
): ApiError {
	const issues = error.issues
		.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
		.join('; ')
	return new ApiError(
		'InvalidRequest',
		400,
		`Invalid ${what} for ${endpoint}: ${issues}`,
		{ body: error.format() },
	)
}

function validateParams(
	endpoint: string,
	schema: ParamSchema | undefined,
	value: unknown,
	what: string,
): ParamRecord | undefined {
	if (!schema) return undefined
	const parsed = schema.safeParse(value ?? {})
	if (!parsed.success) {
		throw invalidRequest(endpoint, what, parsed.error)
	}
	return parsed.data
}

export function buildUrl(
	apiServer: string,
	endpointTemplate: string,
	pathParams?: ParamRecord,
	queryParams?: ParamRecord,
): URL {
	let finalPath = endpointTemplate
	for (const [key, value] of Object.entries(pathParams ?? {})) {
		if (value === undefined) continue
		finalPath = finalPath.replace(`{${key}}`, encodeURIComponent(String(value)))
	}
	if (/[{}]/.test(finalPath)) {
		throw new ApiError(
			'InvalidRequest',
			400,
			`Unsubstituted placeholders remain in path: ${finalPath}`,
		)
	}

	const url = new URL(`${apiServer}/${API_VERSION}${finalPath}`)
	for (const [key, value] of Object.entries(queryParams ?? {})) {
		if (value !== undefined) {
			url.searchParams.set(key, String(value))
		}
	}
	return url
}

function parseErrorBody(text: string): unknown {
	if (!text) return undefined
	try {
		return JSON.parse(text)
	} catch {
		return { message: text }
	}
}

function describeErrorBody(body: unknown): string | undefined {
	if (body && typeof body === 'object' && 'message' in body) {
		const { message } = body
		if (typeof message === 'string' && message) return message
	}
	return undefined
}

/**
 * Metadata-driven fetch wrapper for Questrade API calls.
 * Handles URL construction, auth, input validation, response parsing, and error handling.
 * Throws ApiError on any failure; nothing is retried.
 */
async function questradeFetch<
	PathSchema extends ParamSchema | undefined,
	QuerySchema extends ParamSchema | undefined,
	ResponseSchema extends z.ZodTypeAny,
>(
	context: RequestContext,
	meta: EndpointMetadata<PathSchema, QuerySchema, ResponseSchema>,
	options: EndpointRequestOptions,
): Promise<z.output<ResponseSchema>> {
	const endpoint = `${meta.method} ${meta.path}`
	const pathParams = validateParams(
		endpoint,
		meta.pathSchema,
		options.pathParams,
		'path parameters',
	)
	const queryParams = validateParams(
		endpoint,
		meta.querySchema,
		options.queryParams,
		'query parameters',
	)
	const url = buildUrl(context.apiServer, meta.path, pathParams, queryParams)

	let response: Response
	try {
		log.debug(`Fetching ${endpoint}`)
		response = await context.fetch(url.toString(), {
			method: meta.method,
			headers: {
				Authorization: `Bearer ${context.accessToken}`,
				Accept: 'application/json',
			},
			signal: options.signal,
		})
	} catch (error) {
		log.error(`Network error calling ${endpoint}`, {
			error: errorMessage(error),
		})
		throw new ApiError('Transport', 0, `Network error: ${errorMessage(error)}`, {
			cause: error,
		})
	}

	if (!response.ok) {
		const body = parseErrorBody(await response.text().catch(() => ''))
		const kind = apiErrorKindForStatus(response.status)
		log.warn(`Request failed: ${endpoint}`, {
			status: response.status,
			kind,
		})
		const detail = describeErrorBody(body)
		throw new ApiError(
			kind,
			response.status,
			detail
				? `${endpoint} failed with status ${response.status}: ${detail}`
				: `${endpoint} failed with status ${response.status}`,
			{ body },
		)
	}

	let json: unknown
	try {
		json = await response.json()
	} catch (error) {
		throw new ApiError(
			'Decode',
			response.status,
			`Failed to parse response from ${meta.path}: ${errorMessage(error)}`,
			{ cause: error },
		)
	}

	const parsed = meta.responseSchema.safeParse(json)
	if (!parsed.success) {
		log.error(`Invalid response schema from ${meta.path}`, {
			issues: parsed.error.issues.length,
		})
		throw new ApiError(
			'Decode',
			response.status,
			`Invalid response format from ${meta.path}`,
			{ body: { validationError: parsed.error.format() }, cause: parsed.error },
		)
	}

	return parsed.data
}
