/**
 * Types shared by the Kite API transport, classifier and client
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

export type JsonPrimitive = string | number | boolean | null

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

/**
 * A successful response body: decoded JSON when the server declared a JSON
 * content type, raw text otherwise (e.g. the CSV instrument dump).
 */
export type ParsedBody = JsonValue | string

export type QueryValue = string | number | boolean | readonly string[] | undefined

/**
 * Everything needed to perform one API call, independent of credentials.
 */
export interface KiteRequest {
	method: HttpMethod
	/** Route relative to the API root, starting with `/` */
	route: string
	query?: Record<string, QueryValue>
	/** Sent as `application/json` */
	json?: Record<string, JsonValue>
	/** Sent as `application/x-www-form-urlencoded` */
	form?: Record<string, string>
}

/**
 * What the transport observed. Never thrown; always returned.
 */
export type TransportOutcome =
	| { type: 'network-error'; cause: string }
	| { type: 'response'; status: number; contentType: string; body: string }

export interface TransportRequest {
	method: HttpMethod
	url: string
	headers: Record<string, string>
	body?: string
	timeoutMs: number
}

export interface Transport {
	send(request: TransportRequest): Promise<TransportOutcome>
	/** Releases pooled connections. Safe to call more than once. */
	close(): Promise<void>
}
