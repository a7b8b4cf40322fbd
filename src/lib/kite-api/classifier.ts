import {
	classifiedError,
	KiteErrorKind,
	type KiteResult,
} from '../errors'
import { err, ok } from '../../types/result'
import {
	type JsonValue,
	type ParsedBody,
	type TransportOutcome,
} from './types'

/**
 * `error_type` tags the API puts in JSON error bodies, mapped 1:1 to kinds.
 * Anything not listed here degrades to General.
 */
export const ERROR_TYPE_MAP: Readonly<Record<string, KiteErrorKind>> =
	Object.freeze({
		TokenException: KiteErrorKind.Token,
		GeneralException: KiteErrorKind.General,
		PermissionException: KiteErrorKind.Permission,
		OrderException: KiteErrorKind.Order,
		InputException: KiteErrorKind.Input,
		DataException: KiteErrorKind.Data,
		NetworkException: KiteErrorKind.Network,
	})

export function isJsonContentType(contentType: string): boolean {
	return contentType.toLowerCase().includes('application/json')
}

function isJsonObject(value: ParsedBody): value is { [key: string]: JsonValue } {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function kindForErrorType(errorType: string): KiteErrorKind {
	return Object.prototype.hasOwnProperty.call(ERROR_TYPE_MAP, errorType)
		? ERROR_TYPE_MAP[errorType]
		: KiteErrorKind.General
}

/**
 * Decides success or failure for one transport outcome.
 *
 * Network failures become Network. A JSON content type with an unparsable
 * body becomes Data. Below 400 the decoded body (or raw text for other
 * content types) is returned untouched. From 400 up, a JSON object body's
 * `error_type` picks the kind; without one the error is General and carries
 * the raw text.
 */
export function classifyResponse(outcome: TransportOutcome): KiteResult<ParsedBody> {
	if (outcome.type === 'network-error') {
		return err(
			classifiedError(KiteErrorKind.Network, `Network error: ${outcome.cause}`),
		)
	}

	const { status, contentType, body: raw } = outcome

	let body: ParsedBody
	if (isJsonContentType(contentType)) {
		try {
			body = JSON.parse(raw)
		} catch {
			return err(
				classifiedError(
					KiteErrorKind.Data,
					`Failed to parse JSON response: ${raw}`,
					status,
				),
			)
		}
	} else {
		body = raw
	}

	if (status < 400) {
		return ok(body)
	}

	if (isJsonObject(body)) {
		const errorType = body.error_type
		if (typeof errorType === 'string' && errorType.length > 0) {
			const message = typeof body.message === 'string' ? body.message : 'Unknown error'
			return err(classifiedError(kindForErrorType(errorType), message, status))
		}
	}

	return err(
		classifiedError(KiteErrorKind.General, `HTTP error: ${status} - ${raw}`, status),
	)
}
