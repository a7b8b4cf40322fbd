export const API_VERSION = '3'
export const USER_AGENT = 'kite-wrapper/0.1.0'

export interface SessionHeaders {
	'X-Kite-Version': string
	'User-Agent': string
	Authorization: string
}

/**
 * Header state derived from the credentials. The token part of the
 * authorization value is empty until a session has been established.
 */
export function buildSessionHeaders(
	apiKey: string,
	accessToken?: string,
): SessionHeaders {
	return Object.freeze({
		'X-Kite-Version': API_VERSION,
		'User-Agent': USER_AGENT,
		Authorization: `token ${apiKey}:${accessToken ?? ''}`,
	})
}
