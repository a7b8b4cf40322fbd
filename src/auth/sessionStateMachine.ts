import { createHash } from 'crypto'
import { z } from 'zod'
import {
	classifiedError,
	KiteErrorKind,
	type KiteResult,
} from '../lib/errors'
import { API_VERSION } from '../lib/kite-api/headers'
import { buildGenerateSessionRequest } from '../lib/kite-api/requests'
import { type KiteRequest, type ParsedBody } from '../lib/kite-api/types'
import { type AppLogger } from '../shared/log'
import { err, ok } from '../types/result'

/**
 * Session states
 *
 * - unauthenticated: no access token yet
 * - awaiting-request-token: login URL issued, waiting for the redirect's request token
 * - authenticated: access token set
 */
export type SessionState =
	| { status: 'unauthenticated' }
	| { status: 'awaiting-request-token'; loginUrl: string }
	| { status: 'authenticated'; accessToken: string }

export type SessionStatus = SessionState['status']

export interface SessionStateEvent {
	previousState: SessionStatus
	newState: SessionStatus
	timestamp: number
}

export type SessionStateListener = (event: SessionStateEvent) => void

/** Asked for the request token once the login URL is known */
export type RequestTokenProvider = (loginUrl: string) => Promise<string>

export interface SessionStateMachineOptions {
	apiKey: string
	/** May be absent; `generateSession` then needs one passed explicitly */
	apiSecret?: string
	accessToken?: string
	loginBaseUrl: string
	/** Performs a request through the client's dispatch path */
	dispatch: (request: KiteRequest) => Promise<KiteResult<ParsedBody>>
	/** Stores a newly obtained token (credentials, headers, config file) */
	onAccessToken: (accessToken: string) => Promise<void>
	logger: AppLogger
}

export const MISSING_SECRET_MESSAGE = 'API secret is required to generate a session.'
export const MISSING_REQUEST_TOKEN_MESSAGE = 'Request token is required to generate a session.'
export const MISSING_ACCESS_TOKEN_MESSAGE =
	"Failed to generate session: 'access_token' not found in response."

const SessionPayloadSchema = z
	.object({ access_token: z.string().min(1) })
	.passthrough()

export type SessionPayload = z.infer<typeof SessionPayloadSchema>

/**
 * SHA-256 of api_key + request_token + api_secret, as the session endpoint
 * expects.
 */
export function sessionChecksum(
	apiKey: string,
	requestToken: string,
	apiSecret: string,
): string {
	return createHash('sha256')
		.update(apiKey + requestToken + apiSecret)
		.digest('hex')
}

/**
 * Success bodies come wrapped as `{ status: 'success', data: {...} }`.
 */
function unwrapEnvelope(body: ParsedBody): unknown {
	if (typeof body === 'object' && body !== null && !Array.isArray(body) && 'data' in body) {
		return body.data
	}
	return body
}

/**
 * Tracks the login flow for one client and performs the request-token
 * exchange. Starts authenticated when an access token is already known.
 */
export class SessionStateMachine {
	private state: SessionState
	private apiSecret?: string
	private readonly listeners: SessionStateListener[] = []

	constructor(private readonly options: SessionStateMachineOptions) {
		this.apiSecret = options.apiSecret || undefined
		this.state = options.accessToken
			? { status: 'authenticated', accessToken: options.accessToken }
			: { status: 'unauthenticated' }
	}

	get current(): SessionState {
		return this.state
	}

	get isAuthenticated(): boolean {
		return this.state.status === 'authenticated'
	}

	onStateChange(listener: SessionStateListener): void {
		this.listeners.push(listener)
	}

	private transition(next: SessionState): void {
		const previousState = this.state.status
		this.state = next
		this.options.logger.debug(`Session state: ${next.status}`)

		const event: SessionStateEvent = {
			previousState,
			newState: next.status,
			timestamp: Date.now(),
		}
		for (const listener of this.listeners) {
			try {
				listener(event)
			} catch (error) {
				this.options.logger.error('Error in session state listener', { error })
			}
		}
	}

	/**
	 * Builds the interactive login URL. No network call is made.
	 */
	loginUrl(): string {
		const url = new URL(this.options.loginBaseUrl)
		url.searchParams.set('api_key', this.options.apiKey)
		url.searchParams.set('v', API_VERSION)
		const loginUrl = url.toString()

		if (this.state.status !== 'authenticated') {
			this.transition({ status: 'awaiting-request-token', loginUrl })
		}
		return loginUrl
	}

	/**
	 * Exchanges a request token for a session. Fails with Input before any
	 * network call when the request token or the secret is missing.
	 */
	async generateSession(
		requestToken: string,
		apiSecret?: string,
	): Promise<KiteResult<SessionPayload>> {
		const secret = apiSecret || this.apiSecret
		if (!requestToken) {
			return err(classifiedError(KiteErrorKind.Input, MISSING_REQUEST_TOKEN_MESSAGE))
		}
		if (!secret) {
			return err(classifiedError(KiteErrorKind.Input, MISSING_SECRET_MESSAGE))
		}

		const { apiKey, dispatch, logger } = this.options
		const result = await dispatch(
			buildGenerateSessionRequest(
				apiKey,
				requestToken,
				sessionChecksum(apiKey, requestToken, secret),
			),
		)
		if (!result.success) {
			logger.warn('Session exchange failed', {
				kind: result.error.kind,
				code: result.error.code,
			})
			return result
		}

		const payload = SessionPayloadSchema.safeParse(unwrapEnvelope(result.data))
		if (!payload.success) {
			return err(classifiedError(KiteErrorKind.Token, MISSING_ACCESS_TOKEN_MESSAGE))
		}

		await this.acceptAccessToken(payload.data.access_token)
		logger.info('Session generated successfully. Access token set.')
		return ok(payload.data)
	}

	/**
	 * Runs the whole login when needed: issue the login URL, obtain the
	 * request token from the provider, exchange it. Returns immediately when
	 * already authenticated.
	 */
	async authenticate(provider: RequestTokenProvider): Promise<KiteResult<SessionState>> {
		if (this.state.status === 'authenticated') {
			return ok(this.state)
		}

		const requestToken = (await provider(this.loginUrl())).trim()
		const session = await this.generateSession(requestToken)
		if (!session.success) {
			return session
		}
		return ok(this.state)
	}

	async acceptAccessToken(accessToken: string): Promise<void> {
		await this.options.onAccessToken(accessToken)
		this.transition({ status: 'authenticated', accessToken })
	}
}
