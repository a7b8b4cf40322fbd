/**
 * Request builders - one per API route
 *
 * Each builder validates its inputs and lists exactly the fields it
 * forwards. Validation failures come back as Input errors, before anything
 * touches the network.
 */

import { z } from 'zod'
import { formatIssues } from '../../config/clientConfig'
import {
	classifiedError,
	KiteErrorKind,
	type KiteResult,
} from '../errors'
import { err, ok } from '../../types/result'
import { type JsonValue, type KiteRequest } from './types'

// --- Shared schemas ---

export const VarietySchema = z.enum(['regular', 'amo', 'co', 'iceberg', 'auction'])
export const TransactionTypeSchema = z.enum(['BUY', 'SELL'])
export const OrderTypeSchema = z.enum(['MARKET', 'LIMIT', 'SL', 'SL-M'])
export const ValiditySchema = z.enum(['DAY', 'IOC', 'TTL'])
export const SegmentSchema = z.enum(['equity', 'commodity'])
export const IntervalSchema = z.enum([
	'minute',
	'3minute',
	'5minute',
	'10minute',
	'15minute',
	'30minute',
	'60minute',
	'day',
])

const idSchema = z.string().min(1, 'cannot be empty')
const quantitySchema = z.number().int('must be a whole number').positive('must be positive')
const priceSchema = z.number().nonnegative('cannot be negative')

const PlaceOrderSchema = z.object({
	variety: VarietySchema,
	exchange: idSchema,
	tradingsymbol: idSchema,
	transactionType: TransactionTypeSchema,
	quantity: quantitySchema,
	product: idSchema,
	orderType: OrderTypeSchema,
	price: priceSchema.optional(),
	validity: ValiditySchema.optional(),
	disclosedQuantity: quantitySchema.optional(),
	triggerPrice: priceSchema.optional(),
	squareoff: priceSchema.optional(),
	stoploss: priceSchema.optional(),
	trailingStoploss: priceSchema.optional(),
	tag: z.string().max(20, 'must be at most 20 characters').optional(),
})

const ModifyOrderSchema = z.object({
	variety: VarietySchema,
	orderId: idSchema,
	parentOrderId: idSchema.optional(),
	quantity: quantitySchema.optional(),
	price: priceSchema.optional(),
	orderType: OrderTypeSchema.optional(),
	triggerPrice: priceSchema.optional(),
	validity: ValiditySchema.optional(),
	disclosedQuantity: quantitySchema.optional(),
})

const CancelOrderSchema = z.object({
	variety: VarietySchema,
	orderId: idSchema,
	parentOrderId: idSchema.optional(),
})

const dateInputSchema = z.union([idSchema, z.date()])

const HistoricalDataSchema = z.object({
	instrumentToken: z.union([
		z.number().int().positive(),
		z.string().regex(/^\d+$/, 'must be numeric'),
	]),
	from: dateInputSchema,
	to: dateInputSchema,
	interval: IntervalSchema,
	continuous: z.boolean().optional().default(false),
	oi: z.boolean().optional().default(false),
})

export type Variety = z.infer<typeof VarietySchema>
export type Segment = z.infer<typeof SegmentSchema>
export type PlaceOrderParams = z.input<typeof PlaceOrderSchema>
export type ModifyOrderParams = z.input<typeof ModifyOrderSchema>
export type CancelOrderParams = z.input<typeof CancelOrderSchema>
export type HistoricalDataParams = z.input<typeof HistoricalDataSchema>

// --- Helpers ---

function validate<S extends z.ZodTypeAny>(
	schema: S,
	operation: string,
	input: unknown,
): KiteResult<z.output<S>> {
	const parsed = schema.safeParse(input)
	if (!parsed.success) {
		return err(
			classifiedError(
				KiteErrorKind.Input,
				formatIssues(`Invalid ${operation} parameters:`, parsed.error),
			),
		)
	}
	return ok(parsed.data)
}

function compact(fields: Record<string, JsonValue | undefined>): Record<string, JsonValue> {
	const payload: Record<string, JsonValue> = {}
	for (const [key, value] of Object.entries(fields)) {
		if (value !== undefined) {
			payload[key] = value
		}
	}
	return payload
}

const segment = (value: string | number) => encodeURIComponent(String(value))

const pad = (value: number) => String(value).padStart(2, '0')

/**
 * Formats a Date as `yyyy-mm-dd hh:mm:ss` in local time
 */
export function formatKiteDate(date: Date): string {
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
	const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
	return `${day} ${time}`
}

// --- Session ---

export function buildGenerateSessionRequest(
	apiKey: string,
	requestToken: string,
	checksum: string,
): KiteRequest {
	return {
		method: 'POST',
		route: '/session/token',
		form: { api_key: apiKey, request_token: requestToken, checksum },
	}
}

// --- User ---

export function buildProfileRequest(): KiteRequest {
	return { method: 'GET', route: '/user/profile' }
}

export function buildMarginsRequest(segmentName?: Segment): KiteResult<KiteRequest> {
	const parsed = validate(SegmentSchema.optional(), 'margins', segmentName)
	if (!parsed.success) return parsed
	const route = parsed.data ? `/user/margins/${parsed.data}` : '/user/margins'
	return ok({ method: 'GET', route })
}

// --- Orders ---

export function buildPlaceOrderRequest(params: PlaceOrderParams): KiteResult<KiteRequest> {
	const parsed = validate(PlaceOrderSchema, 'placeOrder', params)
	if (!parsed.success) return parsed
	const p = parsed.data
	return ok({
		method: 'POST',
		route: `/orders/${p.variety}`,
		json: compact({
			exchange: p.exchange,
			tradingsymbol: p.tradingsymbol,
			transaction_type: p.transactionType,
			quantity: p.quantity,
			product: p.product,
			order_type: p.orderType,
			price: p.price,
			validity: p.validity,
			disclosed_quantity: p.disclosedQuantity,
			trigger_price: p.triggerPrice,
			squareoff: p.squareoff,
			stoploss: p.stoploss,
			trailing_stoploss: p.trailingStoploss,
			tag: p.tag,
		}),
	})
}

export function buildModifyOrderRequest(params: ModifyOrderParams): KiteResult<KiteRequest> {
	const parsed = validate(ModifyOrderSchema, 'modifyOrder', params)
	if (!parsed.success) return parsed
	const p = parsed.data
	return ok({
		method: 'PUT',
		route: `/orders/${p.variety}/${segment(p.orderId)}`,
		json: compact({
			parent_order_id: p.parentOrderId,
			quantity: p.quantity,
			price: p.price,
			order_type: p.orderType,
			trigger_price: p.triggerPrice,
			validity: p.validity,
			disclosed_quantity: p.disclosedQuantity,
		}),
	})
}

export function buildCancelOrderRequest(params: CancelOrderParams): KiteResult<KiteRequest> {
	const parsed = validate(CancelOrderSchema, 'cancelOrder', params)
	if (!parsed.success) return parsed
	const p = parsed.data
	return ok({
		method: 'DELETE',
		route: `/orders/${p.variety}/${segment(p.orderId)}`,
		query: { parent_order_id: p.parentOrderId },
	})
}

export function buildOrderHistoryRequest(orderId: string): KiteResult<KiteRequest> {
	const parsed = validate(idSchema, 'orderHistory', orderId)
	if (!parsed.success) return parsed
	return ok({ method: 'GET', route: `/orders/${segment(parsed.data)}` })
}

export function buildTradesRequest(orderId?: string): KiteResult<KiteRequest> {
	const parsed = validate(idSchema.optional(), 'trades', orderId)
	if (!parsed.success) return parsed
	const route = parsed.data ? `/orders/${segment(parsed.data)}/trades` : '/trades'
	return ok({ method: 'GET', route })
}

// --- Portfolio ---

export function buildPositionsRequest(): KiteRequest {
	return { method: 'GET', route: '/portfolio/positions' }
}

export function buildHoldingsRequest(): KiteRequest {
	return { method: 'GET', route: '/portfolio/holdings' }
}

// --- Market data ---

export function buildInstrumentsRequest(exchange?: string): KiteResult<KiteRequest> {
	const parsed = validate(idSchema.optional(), 'instruments', exchange)
	if (!parsed.success) return parsed
	const route = parsed.data
		? `/instruments/${segment(parsed.data.toUpperCase())}`
		: '/instruments'
	return ok({ method: 'GET', route })
}

export const NO_INSTRUMENTS_MESSAGE = 'At least one instrument must be provided for a quote.'

export function buildQuoteRequest(instruments: readonly string[]): KiteResult<KiteRequest> {
	if (instruments.length === 0) {
		return err(classifiedError(KiteErrorKind.Input, NO_INSTRUMENTS_MESSAGE))
	}
	const parsed = validate(z.array(idSchema), 'quote', instruments)
	if (!parsed.success) return parsed
	return ok({ method: 'GET', route: '/quote', query: { i: parsed.data } })
}

export function buildHistoricalDataRequest(
	params: HistoricalDataParams,
): KiteResult<KiteRequest> {
	const parsed = validate(HistoricalDataSchema, 'historicalData', params)
	if (!parsed.success) return parsed
	const p = parsed.data
	const toText = (value: string | Date) =>
		value instanceof Date ? formatKiteDate(value) : value
	return ok({
		method: 'GET',
		route: `/instruments/historical/${segment(p.instrumentToken)}/${p.interval}`,
		query: {
			from: toText(p.from),
			to: toText(p.to),
			continuous: p.continuous ? 1 : 0,
			oi: p.oi ? 1 : 0,
		},
	})
}
