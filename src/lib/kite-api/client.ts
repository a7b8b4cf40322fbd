/**
 * Kite API Client - call dispatch with credentials, headers and classified errors
 */

import {
	type RequestTokenProvider,
	type SessionPayload,
	type SessionState,
	SessionStateMachine,
} from '../../auth/sessionStateMachine'
import {
	buildClientConfig,
	type KiteClientConfig,
	type KiteClientOptions,
} from '../../config/clientConfig'
import {
	defaultConfigPath,
	type EnvironmentView,
	persistToken,
	resolveCredentials,
	type ResolvedCredentials,
} from '../../config/credentials'
import { type AppLogger, buildLogger } from '../../shared/log'
import { maskCredential, sanitizeError } from '../../shared/secureLogger'
import { err, ok } from '../../types/result'
import {
	classifiedError,
	describeError,
	isKiteError,
	KiteErrorKind,
	type KiteResult,
} from '../errors'
import { classifyResponse } from './classifier'
import { buildSessionHeaders, type SessionHeaders } from './headers'
import {
	buildCancelOrderRequest,
	buildHistoricalDataRequest,
	buildHoldingsRequest,
	buildInstrumentsRequest,
	buildMarginsRequest,
	buildModifyOrderRequest,
	buildOrderHistoryRequest,
	buildPlaceOrderRequest,
	buildPositionsRequest,
	buildProfileRequest,
	buildQuoteRequest,
	buildTradesRequest,
	type CancelOrderParams,
	type HistoricalDataParams,
	type ModifyOrderParams,
	type PlaceOrderParams,
	type Segment,
} from './requests'
import { UndiciTransport } from './transport'
import {
	type KiteRequest,
	type ParsedBody,
	type Transport,
	type TransportOutcome,
	type TransportRequest,
} from './types'

export interface KiteClientDependencies {
	/** Defaults to `process.env` */
	env?: EnvironmentView
	/** Defaults to an UndiciTransport built from the options */
	transport?: Transport
	/** Defaults to a pino logger at `debug` or `info` depending on `options.debug` */
	logger?: AppLogger
}

function statusOf(error: unknown): number | undefined {
	if (typeof error === 'object' && error !== null && 'status' in error) {
		const { status } = error
		return typeof status === 'number' ? status : undefined
	}
	return undefined
}

export function buildUrl(root: string, request: KiteRequest): URL {
	if (!request.route.startsWith('/')) {
		throw new Error(`Route must start with '/': ${request.route}`)
	}
	const url = new URL(root.replace(/\/+$/, '') + request.route)
	for (const [key, value] of Object.entries(request.query ?? {})) {
		if (value === undefined) continue
		if (Array.isArray(value)) {
			for (const item of value) {
				url.searchParams.append(key, item)
			}
		} else {
			url.searchParams.set(key, String(value))
		}
	}
	return url
}

export class KiteClient {
	private credentials: ResolvedCredentials
	private headers: SessionHeaders
	private readonly session: SessionStateMachine

	private constructor(
		readonly config: KiteClientConfig,
		credentials: ResolvedCredentials,
		private readonly transport: Transport,
		private readonly logger: AppLogger,
	) {
		this.credentials = credentials
		this.headers = buildSessionHeaders(credentials.apiKey, credentials.accessToken)
		this.session = new SessionStateMachine({
			apiKey: credentials.apiKey,
			apiSecret: credentials.apiSecret,
			accessToken: credentials.accessToken,
			loginBaseUrl: config.loginUrl,
			dispatch: (request) => this.request(request),
			onAccessToken: (token) => this.storeAccessToken(token),
			logger: logger.child('session'),
		})
	}

	/**
	 * Validates the options, resolves credentials (explicit > environment >
	 * config file) and wires the transport.
	 */
	static async create(
		options: KiteClientOptions = {},
		deps: KiteClientDependencies = {},
	): Promise<KiteResult<KiteClient>> {
		const config = buildClientConfig(options)
		if (!config.success) {
			return config
		}

		const logger = deps.logger ?? buildLogger(config.data.debug ? 'debug' : 'info')
		const filePath = config.data.configPath ?? defaultConfigPath(config.data.homeDir)
		const credentials = await resolveCredentials(
			{
				apiKey: config.data.apiKey,
				apiSecret: config.data.apiSecret,
				accessToken: config.data.accessToken,
			},
			deps.env ?? process.env,
			filePath,
			logger,
		)
		if (!credentials.success) {
			logger.error('Credential resolution failed', { path: filePath })
			return credentials
		}

		const transport =
			deps.transport ??
			new UndiciTransport({
				proxy: config.data.proxy,
				connectTimeoutMs: config.data.timeout,
				logger,
			})

		const client = new KiteClient(config.data, credentials.data, transport, logger)
		logger.debug('Kite client initialized', {
			apiKey: maskCredential(credentials.data.apiKey),
			configPath: filePath,
			authenticated: client.isAuthenticated,
		})
		return ok(client)
	}

	get apiKey(): string {
		return this.credentials.apiKey
	}

	get accessToken(): string | undefined {
		return this.credentials.accessToken
	}

	get sessionState(): SessionState {
		return this.session.current
	}

	get isAuthenticated(): boolean {
		return this.session.isAuthenticated
	}

	get sessionHeaders(): SessionHeaders {
		return this.headers
	}

	/**
	 * Sends one request and classifies the outcome. Never throws for remote
	 * or transport failures.
	 */
	async request(request: KiteRequest): Promise<KiteResult<ParsedBody>> {
		const url = buildUrl(this.config.root, request)
		const headers: Record<string, string> = { ...this.headers }
		let body: string | undefined
		if (request.json !== undefined) {
			body = JSON.stringify(request.json)
			headers['Content-Type'] = 'application/json'
		} else if (request.form !== undefined) {
			body = new URLSearchParams(request.form).toString()
			headers['Content-Type'] = 'application/x-www-form-urlencoded'
		}

		const transportRequest: TransportRequest = {
			method: request.method,
			url: url.toString(),
			headers,
			body,
			timeoutMs: this.config.timeout,
		}
		this.logger.debug(`Request: ${request.method} ${url.pathname}`, {
			query: url.search,
		})

		let outcome: TransportOutcome
		try {
			outcome = await this.transport.send(transportRequest)
		} catch (error) {
			this.logger.error('Transport raised unexpectedly', sanitizeError(error))
			return err(
				classifiedError(
					KiteErrorKind.General,
					`Unexpected transport failure: ${describeError(error)}`,
					statusOf(error),
				),
			)
		}

		if (outcome.type === 'response') {
			this.logger.debug(`Response: ${outcome.status}`, {
				contentType: outcome.contentType,
			})
		}
		const result = classifyResponse(outcome)
		if (!result.success) {
			this.logger.debug('Request failed', {
				kind: result.error.kind,
				code: result.error.code,
			})
		}
		return result
	}

	private async storeAccessToken(accessToken: string): Promise<void> {
		this.credentials = { ...this.credentials, accessToken }
		this.headers = buildSessionHeaders(this.credentials.apiKey, accessToken)
		await persistToken(this.credentials.sourcePath, accessToken, this.logger)
		this.logger.debug('Access token updated.')
	}

	// --- Authentication ---

	loginUrl(): string {
		return this.session.loginUrl()
	}

	generateSession(
		requestToken: string,
		apiSecret?: string,
	): Promise<KiteResult<SessionPayload>> {
		return this.session.generateSession(requestToken, apiSecret)
	}

	authenticate(provider: RequestTokenProvider): Promise<KiteResult<SessionState>> {
		return this.session.authenticate(provider)
	}

	setAccessToken(accessToken: string): Promise<void> {
		return this.session.acceptAccessToken(accessToken)
	}

	// --- Routes ---

	private async dispatch(built: KiteResult<KiteRequest>): Promise<KiteResult<ParsedBody>> {
		if (!built.success) {
			return built
		}
		return this.request(built.data)
	}

	profile(): Promise<KiteResult<ParsedBody>> {
		return this.request(buildProfileRequest())
	}

	margins(segment?: Segment): Promise<KiteResult<ParsedBody>> {
		return this.dispatch(buildMarginsRequest(segment))
	}

	placeOrder(params: PlaceOrderParams): Promise<KiteResult<ParsedBody>> {
		return this.dispatch(buildPlaceOrderRequest(params))
	}

	modifyOrder(params: ModifyOrderParams): Promise<KiteResult<ParsedBody>> {
		return this.dispatch(buildModifyOrderRequest(params))
	}

	cancelOrder(params: CancelOrderParams): Promise<KiteResult<ParsedBody>> {
		return this.dispatch(buildCancelOrderRequest(params))
	}

	orderHistory(orderId: string): Promise<KiteResult<ParsedBody>> {
		return this.dispatch(buildOrderHistoryRequest(orderId))
	}

	trades(orderId?: string): Promise<KiteResult<ParsedBody>> {
		return this.dispatch(buildTradesRequest(orderId))
	}

	positions(): Promise<KiteResult<ParsedBody>> {
		return this.request(buildPositionsRequest())
	}

	holdings(): Promise<KiteResult<ParsedBody>> {
		return this.request(buildHoldingsRequest())
	}

	/** The instrument dump is CSV and comes back as text */
	instruments(exchange?: string): Promise<KiteResult<ParsedBody>> {
		return this.dispatch(buildInstrumentsRequest(exchange))
	}

	quote(...instruments: string[]): Promise<KiteResult<ParsedBody>> {
		return this.dispatch(buildQuoteRequest(instruments))
	}

	historicalData(params: HistoricalDataParams): Promise<KiteResult<ParsedBody>> {
		return this.dispatch(buildHistoricalDataRequest(params))
	}

	close(): Promise<void> {
		return this.transport.close()
	}

	toString(): string {
		return `KiteClient(api_key='${maskCredential(this.credentials.apiKey)}', access_token='${maskCredential(this.credentials.accessToken)}', config_path='${this.credentials.sourcePath}')`
	}
}

/**
 * Creates a client, hands it to `fn` and closes it afterwards, whether `fn`
 * resolves or throws. A KiteError thrown by `fn` (e.g. from `unwrap`) comes
 * back as a failed Result; anything else is rethrown.
 */
export async function withKiteClient<T>(
	options: KiteClientOptions,
	fn: (client: KiteClient) => Promise<T>,
	deps: KiteClientDependencies = {},
): Promise<KiteResult<T>> {
	const created = await KiteClient.create(options, deps)
	if (!created.success) {
		return created
	}
	const client = created.data
	try {
		return ok(await fn(client))
	} catch (error) {
		if (isKiteError(error)) {
			return err(error.toClassifiedError())
		}
		throw error
	} finally {
		await client.close()
	}
}
