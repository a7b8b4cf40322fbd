import { readFile, writeFile } from 'fs/promises'
import { homedir } from 'os'
import { join } from 'path'
import { parse } from 'ini'
import {
	classifiedError,
	KiteErrorKind,
	type KiteResult,
} from '../lib/errors'
import { type AppLogger } from '../shared/log'
import { err, ok } from '../types/result'

export const CONFIG_SECTION = 'Kite'

export const ENV_KEYS = {
	apiKey: 'KITE_API_KEY',
	apiSecret: 'KITE_API_SECRET',
	accessToken: 'KITE_ACCESS_TOKEN',
} as const

const FILE_KEYS = {
	apiKey: 'api_key',
	apiSecret: 'api_secret',
	accessToken: 'access_token',
} as const

export const MISSING_CREDENTIALS_MESSAGE =
	'API key or secret is missing. Please set them in config or environment variables.'

type CredentialField = keyof typeof ENV_KEYS

const FIELDS: readonly CredentialField[] = ['apiKey', 'apiSecret', 'accessToken']

export type PartialCredentials = Partial<Record<CredentialField, string>>

/**
 * Read-only view over environment variables. `process.env` satisfies it.
 */
export type EnvironmentView = Readonly<Record<string, string | undefined>>

export interface ResolvedCredentials {
	apiKey: string
	apiSecret: string
	accessToken?: string
	/** The config file the credentials were resolved against */
	sourcePath: string
}

export function defaultConfigPath(homeDir: string = homedir()): string {
	return join(homeDir, '.kite', 'config.ini')
}

const SECTION_HEADER = /^\s*\[([^\]]*)\]\s*$/
const COMMENT_LINE = /^\s*[;#]/

function isQuoted(value: string): boolean {
	const quote = value.charAt(0)
	return value.length > 1 && (quote === '"' || quote === "'") && value.endsWith(quote)
}

/**
 * Values are literal: `;` and `#` inside them do not start a comment, but
 * `ini` stops reading a value at either. Escape them before parsing.
 */
function escapeInlineComments(content: string): string {
	return content
		.split(/\r?\n/)
		.map((line) => {
			if (SECTION_HEADER.test(line) || COMMENT_LINE.test(line)) return line
			const separator = line.indexOf('=')
			if (separator === -1) return line
			const value = line.slice(separator + 1)
			if (isQuoted(value.trim())) return line
			return line.slice(0, separator + 1) + value.replace(/[\\;#]/g, (char) => `\\${char}`)
		})
		.join('\n')
}

/** Key of an `key = value` line, lower-cased; undefined for anything else */
function keyOf(line: string): string | undefined {
	if (COMMENT_LINE.test(line) || SECTION_HEADER.test(line)) return undefined
	const separator = line.indexOf('=')
	if (separator === -1) return undefined
	return line.slice(0, separator).trim().toLowerCase()
}

/** Keys match case-insensitively within a section */
function lookup(section: Record<string, unknown>, key: string): unknown {
	const name = Object.keys(section).find((candidate) => candidate.toLowerCase() === key)
	return name === undefined ? undefined : section[name]
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function errorCode(error: unknown): string | undefined {
	if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
		return error.code
	}
	return undefined
}

/**
 * Reads and decodes the config file. Any failure (missing, unreadable)
 * yields null so the caller can fall through to the final presence check.
 */
async function readConfigFile(
	filePath: string,
	logger?: AppLogger,
): Promise<Record<string, unknown> | null> {
	try {
		const content = await readFile(filePath, 'utf-8')
		return parse(escapeInlineComments(content))
	} catch (error) {
		logger?.debug('Config file not read', {
			path: filePath,
			reason: errorCode(error) ?? String(error),
		})
		return null
	}
}

/**
 * Resolves each credential field independently, highest precedence first:
 * explicit value, then environment variable, then the `[Kite]` section of
 * the INI file at `filePath`.
 *
 * Only an unset value falls through: an empty string is a value and stops
 * the chain there. Fails with a `Data` error when the key or the secret ends
 * up unset or empty; a missing access token is a valid pre-login state.
 */
export async function resolveCredentials(
	explicit: PartialCredentials,
	env: EnvironmentView,
	filePath: string,
	logger?: AppLogger,
): Promise<KiteResult<ResolvedCredentials>> {
	const resolved: PartialCredentials = {}

	for (const field of FIELDS) {
		resolved[field] = explicit[field] ?? env[ENV_KEYS[field]]
	}

	if (FIELDS.some((field) => resolved[field] === undefined)) {
		const parsed = await readConfigFile(filePath, logger)
		const section = parsed?.[CONFIG_SECTION]
		if (isRecord(section)) {
			for (const field of FIELDS) {
				const fileValue = lookup(section, FILE_KEYS[field])
				if (resolved[field] === undefined && typeof fileValue === 'string') {
					resolved[field] = fileValue
				}
			}
		} else if (parsed) {
			logger?.debug(`Config file has no [${CONFIG_SECTION}] section`, {
				path: filePath,
			})
		}
	}

	const { apiKey, apiSecret, accessToken } = resolved
	if (!apiKey || !apiSecret) {
		return err(
			classifiedError(KiteErrorKind.Data, MISSING_CREDENTIALS_MESSAGE),
		)
	}

	return ok({
		apiKey,
		apiSecret,
		...(accessToken !== undefined && { accessToken }),
		sourcePath: filePath,
	})
}

/**
 * Sets `access_token` in the `[Kite]` section of an INI document. An existing
 * entry is replaced in place, otherwise the entry is added at the end of the
 * section, and the section is appended when the document has none. Every
 * other line is kept as written.
 */
export function upsertAccessToken(content: string, token: string): string {
	const newline = content.includes('\r\n') ? '\r\n' : '\n'
	const assignment = `${FILE_KEYS.accessToken} = ${token}`
	const lines = content.split(/\r?\n/)

	let sectionStart = -1
	let sectionEnd = lines.length
	for (let i = 0; i < lines.length; i++) {
		const header = SECTION_HEADER.exec(lines[i])
		if (!header) continue
		if (sectionStart !== -1) {
			sectionEnd = i
			break
		}
		if (header[1].trim() === CONFIG_SECTION) {
			sectionStart = i
		}
	}

	if (sectionStart === -1) {
		const body = content.length === 0 || content.endsWith('\n') ? content : content + newline
		const gap = body.trim().length > 0 ? newline : ''
		return `${body}${gap}[${CONFIG_SECTION}]${newline}${assignment}${newline}`
	}

	for (let i = sectionStart + 1; i < sectionEnd; i++) {
		if (keyOf(lines[i]) === FILE_KEYS.accessToken) {
			lines[i] = assignment
			return lines.join(newline)
		}
	}

	// After the section's last non-blank line
	let insertAt = sectionEnd
	while (insertAt > sectionStart + 1 && lines[insertAt - 1].trim() === '') {
		insertAt--
	}
	lines.splice(insertAt, 0, assignment)
	return lines.join(newline)
}

/**
 * Upserts `access_token` into the `[Kite]` section of an existing config
 * file, leaving every other line untouched. Skips silently when the file
 * does not exist or cannot be read or written.
 *
 * @returns whether the file was rewritten
 */
export async function persistToken(
	filePath: string,
	token: string,
	logger?: AppLogger,
): Promise<boolean> {
	let content: string
	try {
		content = await readFile(filePath, 'utf-8')
	} catch (error) {
		logger?.debug('Config file not read', {
			path: filePath,
			reason: errorCode(error) ?? String(error),
		})
		return false
	}

	try {
		await writeFile(filePath, upsertAccessToken(content, token), 'utf-8')
		logger?.debug('Access token persisted', { path: filePath })
		return true
	} catch (error) {
		logger?.debug('Access token not persisted', {
			path: filePath,
			reason: errorCode(error) ?? String(error),
		})
		return false
	}
}
