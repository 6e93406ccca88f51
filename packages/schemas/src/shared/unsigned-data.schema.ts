/**
 * UnsignedData: Side-channel data attached to an event but excluded from its signature
 *
 * An open map: servers add keys over time, and the codec must carry every one of them through unchanged. Two keys are
 * well known and validated when present:
 *
 * - `age`: milliseconds elapsed since the event was sent, as computed by the server delivering it
 * - `transaction_id`: the client transaction ID, only echoed back to the sender
 *
 * Keys keep their wire spelling: this is the one part of the envelope that is never renamed.
 *
 * Decoded maps, and every object or array nested in them, are `Data` values, so two events with the same unsigned
 * content are `Equal.equals`. A `__proto__` key cannot be held as data by a JavaScript object and is rejected.
 */

import * as Data from 'effect/Data'
import { identity } from 'effect/Function'
import * as Predicate from 'effect/Predicate'
import * as Record from 'effect/Record'
import * as Schema from 'effect/Schema'

const PROTOTYPE_KEY = '__proto__'

const hasPrototypeKey = (value: unknown): boolean =>
	Array.isArray(value)
		? value.some(hasPrototypeKey)
		: Predicate.isRecord(value) && (Object.hasOwn(value, PROTOTYPE_KEY) || Object.values(value).some(hasPrototypeKey))

const toData = (value: unknown): unknown => {
	if (Array.isArray(value)) {
		return Data.array(value.map(toData))
	}

	return Predicate.isRecord(value)
		? Data.struct(Object.fromEntries(Object.entries(value).map(([key, nested]): [string, unknown] => [key, toData(nested)])))
		: value
}

/**
 * Any JSON value; objects and arrays decode to `Data` values
 */
const JsonData = Schema.transform(Schema.Unknown, Schema.Unknown, { decode: toData, encode: identity, strict: true })

/**
 * The map itself, without the `Data` wrapper. The encoder validates against this, so hand-built plain maps encode too.
 */
export const UnsignedDataFields = Schema.Struct(
	{
		age: Schema.optionalWith(Schema.Int, { exact: true }),
		transaction_id: Schema.optionalWith(Schema.String, { exact: true }),
	},
	Schema.Record({ key: Schema.String, value: JsonData }),
)

export const UnsignedData = Schema.Data(UnsignedDataFields).annotations({ identifier: 'UnsignedData' })

export declare namespace UnsignedData {
	type Type = typeof UnsignedData.Type
	type Encoded = typeof UnsignedData.Encoded
}

/**
 * UnsignedData as read from the wire: `__proto__` keys are rejected at any depth before the map is decoded
 */
export const UnsignedDataFromWire = Schema.Unknown.pipe(
	Schema.filter((value) => !hasPrototypeKey(value), {
		message: () => `"${PROTOTYPE_KEY}" cannot be used as a key in unsigned data`,
		title: 'NoPrototypeKey',
	}),
	Schema.compose(UnsignedData, { strict: false }),
)

/**
 * Builds an unsigned map with the same structural equality as a decoded one
 *
 * Throws a `ParseError` when a well-known key holds the wrong type, like any schema constructor.
 *
 * @example
 *
 * ```typescript
 * const unsigned = makeUnsignedData({ age: 1234, 'org.example.flags': ['pinned'] })
 * ```
 */
export const makeUnsignedData: (fields: UnsignedData.Encoded) => UnsignedData.Type = Schema.decodeSync(UnsignedData)

/**
 * The empty side-channel, used when `unsigned` is absent from the wire
 */
export const emptyUnsignedData: UnsignedData.Type = makeUnsignedData({})

/**
 * Whether the encoder may omit `unsigned`
 */
export const isEmptyUnsignedData = (unsigned: UnsignedData.Type): boolean => Record.isEmptyReadonlyRecord(unsigned)
