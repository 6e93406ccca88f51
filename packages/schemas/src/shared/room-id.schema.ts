/**
 * RoomId: Identifier of a room, e.g. `!roomid:example.com`
 *
 * Together with the event type and state key, the room ID is part of the overwrite key of every piece of room state.
 */

import type * as Either from 'effect/Either'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

import { Identifier } from './identifier.schema.ts'

const RoomIdBrand: unique symbol = Symbol.for('@room-state/schemas/shared/RoomId')

export class RoomId extends Identifier('!', 'RoomId').pipe(Schema.brand(RoomIdBrand)) {
	/**
	 * Decode string to RoomId with validation
	 *
	 * Checks the `!` sigil, a non-empty localpart without `:`, a server name without whitespace (a port is allowed) and
	 * the length limit, then applies the RoomId brand.
	 *
	 * @example Decode inside Effect.gen
	 *
	 * ```typescript
	 * import * as Effect from 'effect/Effect'
	 * import type * as ParseResult from 'effect/ParseResult'
	 *
	 * import { RoomId } from './room-id.schema.ts'
	 *
	 * export const _program: Effect.Effect<string, ParseResult.ParseError> = Effect.gen(function* () {
	 * 	const roomId = yield* RoomId.decodeEither('!roomid:example.com:8448')
	 * 	return `Room: ${roomId}`
	 * })
	 * ```
	 *
	 * @param value - String to validate and brand
	 *
	 * @returns Either with RoomId or ParseError
	 */
	static readonly decodeEither: (value: string) => Either.Either<RoomId.Type, ParseResult.ParseError> = (value) =>
		Schema.decodeEither(RoomId)(value)
}

export declare namespace RoomId {
	type Type = typeof RoomId.Type
}
