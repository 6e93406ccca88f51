/**
 * EventId: Globally unique identifier of an event
 *
 * Examples: `$h29iv0s8:example.com` (room versions 1 and 2), `$acR1l0raoZnm60CBwAVgqbZqoO/mYU81xysh1u7XcJk` (room
 * version 3 and later, a reference hash).
 */

import type * as Either from 'effect/Either'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

import { Identifier } from './identifier.schema.ts'

const EventIdBrand: unique symbol = Symbol.for('@room-state/schemas/shared/EventId')

export class EventId extends Identifier('$', 'EventId', { opaque: true }).pipe(Schema.brand(EventIdBrand)) {
	/**
	 * Decode string to EventId with validation
	 *
	 * Accepts both event ID shapes: `$localpart:server.name` (room versions 1 and 2) and the opaque `$<base64>`
	 * reference hash used from room version 3 on. Use for:
	 *
	 * - Event IDs taken from request paths or query strings
	 * - Relation targets found inside event content
	 *
	 * The envelope decoder validates `event_id` itself; this is for IDs that arrive outside an event. `Either` is a
	 * subtype of `Effect`, so the result can be yielded inside `Effect.gen` as well.
	 *
	 * @example Decode with Either
	 *
	 * ```typescript
	 * import * as Either from 'effect/Either'
	 * import { pipe } from 'effect/Function'
	 * import type * as ParseResult from 'effect/ParseResult'
	 *
	 * import { EventId } from './event-id.schema.ts'
	 *
	 * // Decode and use with Either chaining
	 * export const _program1: Either.Either<string, ParseResult.ParseError> = pipe(
	 * 	'$acR1l0raoZnm60CBwAVgqbZqoO/mYU81xysh1u7XcJk',
	 * 	EventId.decodeEither,
	 * 	Either.map((eventId) => `Event: ${eventId}`),
	 * )
	 *
	 * // Decode with pattern matching
	 * export const _program2: string = pipe(
	 * 	'$h29iv0s8:example.com',
	 * 	EventId.decodeEither,
	 * 	Either.match({
	 * 		onLeft: (error) => `Invalid event ID: ${error.message}`,
	 * 		onRight: (eventId) => `Valid event: ${eventId}`,
	 * 	}),
	 * )
	 * ```
	 *
	 * @param value - String to validate and brand
	 *
	 * @returns Either with EventId or ParseError
	 */
	static readonly decodeEither: (value: string) => Either.Either<EventId.Type, ParseResult.ParseError> = (value) =>
		Schema.decodeEither(EventId)(value)
}

export declare namespace EventId {
	/**
	 * The branded type: string & Brand<EventIdBrand>
	 */
	type Type = typeof EventId.Type
}
