// Error definitions for the Questrade client, one class per failure domain

export type AuthErrorKind =
	| 'NotAuthenticated'
	| 'TokenRejected'
	| 'Unreachable'
	| 'MalformedResponse'

export type ApiErrorKind =
	| 'NotFound'
	| 'Unauthorized'
	| 'Transport'
	| 'Decode'
	| 'InvalidRequest'
	| 'Http'

interface ErrorOptions {
	status?: number
	cause?: unknown
}

/**
 * Raised when no usable session can be obtained: no prior authenticate, a
 * rejected or expired refresh token, an unreachable token endpoint, or a
 * token response that does not match the expected shape.
 *
 * Never retried by the client. The caller has to obtain a new refresh token.
 */
export class AuthError extends Error {
	public readonly kind: AuthErrorKind
	public readonly status?: number

	constructor(kind: AuthErrorKind, message: string, options: ErrorOptions = {}) {
		super(message)
		this.name = 'AuthError'
		this.kind = kind
		this.status = options.status
		this.cause = options.cause

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * Raised by an authenticated API call.
 *
 * `status` is the HTTP status, or 0 when no response was received.
 */
export class ApiError extends Error {
	public readonly kind: ApiErrorKind
	public readonly status: number
	public readonly body?: unknown

	constructor(
		kind: ApiErrorKind,
		status: number,
		message: string,
		options: { body?: unknown; cause?: unknown } = {},
	) {
		super(message)
		this.name = 'ApiError'
		this.kind = kind
		this.status = status
		this.body = options.body
		this.cause = options.cause

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

export const isAuthError = (e: unknown): e is AuthError => e instanceof AuthError

export const isApiError = (e: unknown): e is ApiError => e instanceof ApiError

/**
 * Maps an HTTP error status from an authenticated call to an error kind
 */
export function apiErrorKindForStatus(status: number): ApiErrorKind {
	if (status === 401 || status === 403) return 'Unauthorized'
	if (status === 404) return 'NotFound'
	return 'Http'
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
