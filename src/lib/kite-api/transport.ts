/**
 * HTTP transport backed by undici
 *
 * Owns a single dispatcher (connection pool, or proxy agent when a proxy is
 * configured) for the lifetime of a client. Failures are reported as
 * outcomes, never thrown, so the classifier sees every result.
 */

import { Agent, fetch, ProxyAgent, type Dispatcher } from 'undici'
import { describeError } from '../errors'
import { type AppLogger } from '../../shared/log'
import {
	type Transport,
	type TransportOutcome,
	type TransportRequest,
} from './types'

export interface UndiciTransportOptions {
	/** Proxy URL, e.g. `http://proxy.internal:3128` */
	proxy?: string
	/** Socket connect timeout (ms) */
	connectTimeoutMs?: number
	/**
	 * Dispatcher to use instead of building one (e.g. undici's MockAgent).
	 * The transport takes ownership and closes it.
	 */
	dispatcher?: Dispatcher
	logger?: AppLogger
}

function createDispatcher(options: UndiciTransportOptions): Dispatcher {
	if (options.dispatcher) {
		return options.dispatcher
	}
	if (options.proxy) {
		return new ProxyAgent({
			uri: options.proxy,
			connect: { timeout: options.connectTimeoutMs },
		})
	}
	return new Agent({
		keepAliveTimeout: 30_000,
		connect: { timeout: options.connectTimeoutMs },
	})
}

export class UndiciTransport implements Transport {
	private readonly dispatcher: Dispatcher
	private readonly logger?: AppLogger
	private closed = false

	constructor(options: UndiciTransportOptions = {}) {
		this.dispatcher = createDispatcher(options)
		this.logger = options.logger
	}

	async send(request: TransportRequest): Promise<TransportOutcome> {
		const { method, url, headers, body, timeoutMs } = request
		// The timeout signal also bounds reading the body
		const signal = AbortSignal.timeout(timeoutMs)

		try {
			const response = await fetch(url, {
				method,
				headers,
				body,
				signal,
				dispatcher: this.dispatcher,
			})
			const text = await response.text()
			return {
				type: 'response',
				status: response.status,
				contentType: response.headers.get('content-type') ?? '',
				body: text,
			}
		} catch (error) {
			const cause = describeError(error)
			this.logger?.debug('Transport failure', { method, url, cause })
			return { type: 'network-error', cause }
		}
	}

	async close(): Promise<void> {
		if (this.closed) return
		this.closed = true
		await this.dispatcher.close()
	}
}
