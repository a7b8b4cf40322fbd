export {
	ENV_KEYS,
	CONFIG_SECTION,
	defaultConfigPath,
	persistToken,
	resolveCredentials,
	upsertAccessToken,
	type EnvironmentView,
	type PartialCredentials,
	type ResolvedCredentials,
} from './config/credentials'
export {
	DEFAULT_LOGIN_URL,
	DEFAULT_ROOT,
	DEFAULT_TIMEOUT_MS,
	type KiteClientConfig,
	type KiteClientOptions,
} from './config/clientConfig'
export {
	KiteErrorKind,
	KiteError,
	isKiteError,
	unwrap,
	type ClassifiedError,
	type KiteResult,
} from './lib/errors'
export { classifyResponse, ERROR_TYPE_MAP } from './lib/kite-api/classifier'
export { buildSessionHeaders, type SessionHeaders } from './lib/kite-api/headers'
export {
	KiteClient,
	withKiteClient,
	type KiteClientDependencies,
} from './lib/kite-api/client'
export { UndiciTransport, type UndiciTransportOptions } from './lib/kite-api/transport'
export type {
	CancelOrderParams,
	HistoricalDataParams,
	ModifyOrderParams,
	PlaceOrderParams,
	Segment,
	Variety,
} from './lib/kite-api/requests'
export type {
	HttpMethod,
	JsonValue,
	KiteRequest,
	ParsedBody,
	Transport,
	TransportOutcome,
	TransportRequest,
} from './lib/kite-api/types'
export {
	SessionStateMachine,
	type RequestTokenProvider,
	type SessionPayload,
	type SessionState,
	type SessionStateEvent,
} from './auth/sessionStateMachine'
export { buildLogger, type AppLogger, type PinoLogLevel } from './shared/log'
export { type Result, ok, err } from './types/result'
