/**
 * Origin server timestamp codec
 *
 * Domain type: `DateTime.Utc`. Wire format: integer milliseconds since the Unix epoch.
 *
 * The wire integer is unsigned. Its upper bound is the last instant a `DateTime` can hold (±8.64e15 ms around the
 * epoch, the ECMAScript time value range), which lies inside `Number.MAX_SAFE_INTEGER`. Values outside `[0, MAX]` are
 * rejected in both directions; they are never clamped.
 */

import * as DateTime from 'effect/DateTime'
import * as Either from 'effect/Either'
import * as Schema from 'effect/Schema'

export const MAX_TIMESTAMP_MS = 8_640_000_000_000_000

/**
 * TimestampOverflowError: Timestamp outside the representable wire range
 *
 * Raised when decoding a negative or too large `origin_server_ts`, and when encoding an instant before the epoch.
 */
export class TimestampOverflowError extends Schema.TaggedError<TimestampOverflowError>()('TimestampOverflowError', {
	/** The offending value, in milliseconds since the epoch */
	millis: Schema.Number,
}) {}

/**
 * Wire shape of `origin_server_ts` before the range check: any integral JSON number
 */
export const WireTimestamp = Schema.Number.pipe(
	Schema.filter((n) => Number.isInteger(n), {
		message: () => 'Expected an integer number of milliseconds',
		title: 'WireTimestamp',
	}),
)

/**
 * `origin_server_ts` as JSON source text: an integer literal, then {@link WireTimestamp}
 *
 * `1.0` and `1e3` denote integral numbers but are not integer literals, and are rejected.
 *
 * @example
 *
 * ```typescript
 * Schema.decodeEither(WireTimestampLiteral)('1700000000000') // Either.right(1700000000000)
 * Schema.decodeEither(WireTimestampLiteral)('1.0') // Either.left(ParseError)
 * ```
 */
export const WireTimestampLiteral = Schema.String.pipe(
	Schema.pattern(/^-?(?:0|[1-9][0-9]*)$/, {
		message: () => 'Expected an integer literal without fraction or exponent',
		title: 'IntegerLiteral',
	}),
	Schema.compose(Schema.parseJson(WireTimestamp)),
)

export const isRepresentable = (millis: number): boolean =>
	Number.isInteger(millis) && millis >= 0 && millis <= MAX_TIMESTAMP_MS

/**
 * Instant → wire milliseconds
 */
export const toWire = (instant: DateTime.DateTime): Either.Either<number, TimestampOverflowError> => {
	const millis = DateTime.toEpochMillis(instant)

	return isRepresentable(millis) ? Either.right(millis) : Either.left(new TimestampOverflowError({ millis }))
}

/**
 * Wire milliseconds → instant
 *
 * Conversion only: callers check {@link isRepresentable} first.
 */
export const fromWire = (millis: number): DateTime.Utc => DateTime.unsafeMake(millis)
