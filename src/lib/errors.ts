import { type Result } from '../types/result'

/**
 * The closed set of failure kinds the client reports.
 *
 * - Token: session or access token invalid or expired
 * - Permission: the account is not allowed to perform the call
 * - Order: order placement or modification rejected
 * - Input: caller-supplied values failed validation
 * - Data: malformed or missing data, local or remote
 * - Network: transport-level failure, including timeouts
 * - General: anything else
 */
export enum KiteErrorKind {
	Token = 'Token',
	Permission = 'Permission',
	Order = 'Order',
	Input = 'Input',
	Data = 'Data',
	Network = 'Network',
	General = 'General',
}

export interface ClassifiedError {
	readonly kind: KiteErrorKind
	readonly message: string
	/** HTTP status for remote failures */
	readonly code?: number
}

export type KiteResult<T> = Result<T, ClassifiedError>

export function classifiedError(
	kind: KiteErrorKind,
	message: string,
	code?: number,
): ClassifiedError {
	return Object.freeze(code === undefined ? { kind, message } : { kind, message, code })
}

/**
 * Thrown form of a ClassifiedError, for callers that prefer exceptions over
 * inspecting a Result.
 */
export class KiteError extends Error {
	readonly kind: KiteErrorKind
	readonly code?: number

	constructor(error: ClassifiedError) {
		super(error.message)
		this.name = 'KiteError'
		this.kind = error.kind
		this.code = error.code
		Object.setPrototypeOf(this, KiteError.prototype)
	}

	toClassifiedError(): ClassifiedError {
		return classifiedError(this.kind, this.message, this.code)
	}
}

/**
 * Type guard to check if an error is an instance of KiteError.
 */
export const isKiteError = (e: unknown): e is KiteError => e instanceof KiteError

/**
 * Returns the success value or throws the failure as a KiteError.
 */
export function unwrap<T>(result: KiteResult<T>): T {
	if (!result.success) {
		throw new KiteError(result.error)
	}
	return result.data
}

/**
 * Best-effort text for an unknown thrown value, following `cause` chains
 * (undici reports `fetch failed` with the socket error as its cause).
 */
export function describeError(error: unknown): string {
	if (!(error instanceof Error)) {
		return String(error)
	}
	const parts = [error.message]
	let cause: unknown = error.cause
	while (cause !== undefined && cause !== null && parts.length < 5) {
		parts.push(cause instanceof Error ? cause.message : String(cause))
		cause = cause instanceof Error ? cause.cause : undefined
	}
	return parts.filter((part) => part.length > 0).join(': ')
}
