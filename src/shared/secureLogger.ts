/**
 * Shortens a credential to a recognisable prefix, e.g. for `toString()`
 * output and log lines.
 */
export function maskCredential(value: string | undefined, visible = 4): string {
	if (!value) return 'None'
	return `${value.substring(0, visible)}...`
}

/**
 * Sanitizes error objects for safe logging
 * Keeps identifying fields and drops everything else
 */
export function sanitizeError(error: unknown): Record<string, unknown> {
	if (!error || typeof error !== 'object') {
		return { message: String(error) }
	}

	const sanitized: Record<string, unknown> = {}
	const safeProps = ['name', 'code', 'status', 'kind'] as const
	for (const prop of safeProps) {
		if (prop in error) {
			sanitized[prop] = Reflect.get(error, prop)
		}
	}
	if (error instanceof Error) {
		sanitized.message = error.message
	}
	return sanitized
}
