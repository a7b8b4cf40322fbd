import { z } from 'zod'
import {
	classifiedError,
	KiteErrorKind,
	type KiteResult,
} from '../lib/errors'
import { err, ok } from '../types/result'

export const DEFAULT_ROOT = 'https://api.kite.trade'
export const DEFAULT_LOGIN_URL = 'https://kite.zerodha.com/connect/login'
export const DEFAULT_TIMEOUT_MS = 7_000

const optionalCredential = z.string().optional()

const clientOptionsSchema = z.object({
	apiKey: optionalCredential,
	apiSecret: optionalCredential,
	accessToken: optionalCredential,

	configPath: z.string().min(1, 'configPath cannot be empty').optional(),

	homeDir: z.string().min(1, 'homeDir cannot be empty').optional(),

	debug: z.boolean().optional().default(false),

	timeout: z
		.number()
		.int('timeout must be a whole number of milliseconds')
		.positive('timeout must be positive')
		.optional()
		.default(DEFAULT_TIMEOUT_MS),

	proxy: z.string().url('proxy must be a valid URL').optional(),

	root: z.string().url('root must be a valid URL').optional().default(DEFAULT_ROOT),

	loginUrl: z
		.string()
		.url('loginUrl must be a valid URL')
		.optional()
		.default(DEFAULT_LOGIN_URL),
})

/** Options accepted by `KiteClient.create` */
export type KiteClientOptions = z.input<typeof clientOptionsSchema>

export type KiteClientConfig = Readonly<z.output<typeof clientOptionsSchema>>

/**
 * Formats zod issues as an indented list, one line per issue.
 */
export function formatIssues(heading: string, error: z.ZodError): string {
	const issues = error.issues
		.map((issue) => {
			const path = issue.path.join('.') || '(root)'
			return `  - ${path}: ${issue.message}`
		})
		.join('\n')
	return `${heading}\n${issues}`
}

export function buildClientConfig(
	options: KiteClientOptions,
): KiteResult<KiteClientConfig> {
	const parsed = clientOptionsSchema.safeParse(options)
	if (!parsed.success) {
		return err(
			classifiedError(
				KiteErrorKind.Input,
				formatIssues('Client configuration validation failed:', parsed.error),
			),
		)
	}
	return ok(Object.freeze(parsed.data))
}
