import { MockAgent } from 'undici'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { buildLogger } from '../../../shared/log'
import { KiteErrorKind } from '../../errors'
import { KiteClient } from '../client'
import { UndiciTransport } from '../transport'
import { type TransportRequest } from '../types'

const ORIGIN = 'https://api.kite.trade'

function get(path: string, timeoutMs = 1_000): TransportRequest {
	return { method: 'GET', url: `${ORIGIN}${path}`, headers: {}, timeoutMs }
}

describe('UndiciTransport', () => {
	let mockAgent: MockAgent
	let transport: UndiciTransport

	beforeEach(() => {
		mockAgent = new MockAgent()
		mockAgent.disableNetConnect()
		transport = new UndiciTransport({ dispatcher: mockAgent })
	})

	afterEach(async () => {
		await transport.close()
	})

	it('should report status, content type and raw body', async () => {
		mockAgent
			.get(ORIGIN)
			.intercept({ path: '/user/profile', method: 'GET' })
			.reply(200, { status: 'success' }, { headers: { 'content-type': 'application/json' } })

		const outcome = await transport.send(get('/user/profile'))

		expect(outcome).toEqual({
			type: 'response',
			status: 200,
			contentType: 'application/json',
			body: '{"status":"success"}',
		})
	})

	it('should report error statuses as responses', async () => {
		mockAgent
			.get(ORIGIN)
			.intercept({ path: '/missing', method: 'GET' })
			.reply(404, 'Resource not found (HTML page)', { headers: { 'content-type': 'text/html' } })

		const outcome = await transport.send(get('/missing'))

		expect(outcome).toEqual({
			type: 'response',
			status: 404,
			contentType: 'text/html',
			body: 'Resource not found (HTML page)',
		})
	})

	it('should send requests with a body', async () => {
		mockAgent
			.get(ORIGIN)
			.intercept({ path: '/session/token', method: 'POST' })
			.reply(200, 'accepted')

		const outcome = await transport.send({
			method: 'POST',
			url: `${ORIGIN}/session/token`,
			headers: { 'X-Kite-Version': '3' },
			body: 'api_key=test-key',
			timeoutMs: 1_000,
		})

		expect(outcome.type === 'response' && outcome.body).toBe('accepted')
	})

	it('should turn connection errors into network outcomes with the cause', async () => {
		mockAgent
			.get(ORIGIN)
			.intercept({ path: '/user/profile', method: 'GET' })
			.replyWithError(new Error('connect ETIMEDOUT'))

		const outcome = await transport.send(get('/user/profile'))

		expect(outcome.type).toBe('network-error')
		expect(outcome.type === 'network-error' && outcome.cause).toContain('connect ETIMEDOUT')
	})

	it('should turn an expired timeout into a network outcome', async () => {
		mockAgent
			.get(ORIGIN)
			.intercept({ path: '/slow', method: 'GET' })
			.reply(200, 'late')
			.delay(500)

		const outcome = await transport.send(get('/slow', 20))

		expect(outcome.type).toBe('network-error')
	})

	it('should tolerate repeated close calls', async () => {
		await transport.close()
		await expect(transport.close()).resolves.toBeUndefined()
	})
})

describe('KiteClient over UndiciTransport', () => {
	it('should classify a real HTTP exchange end to end', async () => {
		const mockAgent = new MockAgent()
		mockAgent.disableNetConnect()
		const pool = mockAgent.get(ORIGIN)
		pool
			.intercept({ path: '/user/profile', method: 'GET' })
			.reply(200, { status: 'success', data: { user_id: 'AB1234' } }, {
				headers: { 'content-type': 'application/json' },
			})
		pool
			.intercept({ path: '/portfolio/holdings', method: 'GET' })
			.reply(
				403,
				{ status: 'error', message: 'Insufficient permission', error_type: 'PermissionException' },
				{ headers: { 'content-type': 'application/json' } },
			)

		const created = await KiteClient.create(
			{ apiKey: 'test-key', apiSecret: 'test-secret', accessToken: 'test-token', configPath: '/nonexistent/config.ini' },
			{
				env: {},
				transport: new UndiciTransport({ dispatcher: mockAgent }),
				logger: buildLogger('silent'),
			},
		)
		if (!created.success) {
			throw new Error(created.error.message)
		}
		const client = created.data

		try {
			expect(await client.profile()).toEqual({
				success: true,
				data: { status: 'success', data: { user_id: 'AB1234' } },
			})
			expect(await client.holdings()).toEqual({
				success: false,
				error: { kind: KiteErrorKind.Permission, message: 'Insufficient permission', code: 403 },
			})
		} finally {
			await client.close()
		}
	})
})
