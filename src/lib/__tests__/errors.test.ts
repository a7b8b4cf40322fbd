import { describe, expect, it } from 'vitest'
import { err, ok } from '../../types/result'
import {
	classifiedError,
	describeError,
	isKiteError,
	KiteError,
	KiteErrorKind,
	unwrap,
} from '../errors'

describe('classifiedError', () => {
	it('should omit the code when none is given', () => {
		expect(classifiedError(KiteErrorKind.Input, 'bad input')).toEqual({
			kind: 'Input',
			message: 'bad input',
		})
		expect('code' in classifiedError(KiteErrorKind.Input, 'bad input')).toBe(false)
	})

	it('should be immutable', () => {
		expect(Object.isFrozen(classifiedError(KiteErrorKind.Order, 'rejected', 400))).toBe(true)
	})
})

describe('unwrap', () => {
	it('should return the data of a success', () => {
		expect(unwrap(ok(42))).toBe(42)
	})

	it('should throw a KiteError carrying kind and code', () => {
		const failure = err(classifiedError(KiteErrorKind.Order, 'Insufficient funds', 400))

		let thrown: unknown
		try {
			unwrap(failure)
		} catch (error) {
			thrown = error
		}

		expect(isKiteError(thrown)).toBe(true)
		if (isKiteError(thrown)) {
			expect(thrown.kind).toBe(KiteErrorKind.Order)
			expect(thrown.code).toBe(400)
			expect(thrown.message).toBe('Insufficient funds')
			expect(thrown.toClassifiedError()).toEqual(failure.error)
		}
	})

	it('should keep KiteError an Error subclass', () => {
		const error = new KiteError(classifiedError(KiteErrorKind.Network, 'down'))

		expect(error).toBeInstanceOf(Error)
		expect(error.name).toBe('KiteError')
	})
})

describe('describeError', () => {
	it('should follow the cause chain', () => {
		const error = new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:443') })

		expect(describeError(error)).toBe('fetch failed: connect ECONNREFUSED 127.0.0.1:443')
	})

	it('should stringify non-errors', () => {
		expect(describeError('plain failure')).toBe('plain failure')
	})
})
