/**
 * RoomAliasId: Human-readable alias of a room, e.g. `#somewhere:example.com`
 *
 * An alias points at a room ID; one room may have many aliases.
 */

import type * as Either from 'effect/Either'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

import { Identifier } from './identifier.schema.ts'

const RoomAliasIdBrand: unique symbol = Symbol.for('@room-state/schemas/shared/RoomAliasId')

export class RoomAliasId extends Identifier('#', 'RoomAliasId').pipe(Schema.brand(RoomAliasIdBrand)) {
	/**
	 * Decode string to RoomAliasId with validation
	 *
	 * A room ID is not an alias: `!somewhere:example.com` fails on the sigil although its shape is the same.
	 *
	 * @example Keep the valid aliases of a list
	 *
	 * ```typescript
	 * import * as Array from 'effect/Array'
	 * import * as Either from 'effect/Either'
	 * import { pipe } from 'effect/Function'
	 *
	 * import { RoomAliasId } from './room-alias-id.schema.ts'
	 *
	 * // ['#lobby:example.com']
	 * export const _aliases: ReadonlyArray<RoomAliasId.Type> = pipe(
	 * 	['#lobby:example.com', '!notanalias:example.com'],
	 * 	Array.filterMap((value) => Either.getRight(RoomAliasId.decodeEither(value))),
	 * )
	 * ```
	 *
	 * @param value - String to validate and brand
	 *
	 * @returns Either with RoomAliasId or ParseError
	 */
	static readonly decodeEither: (value: string) => Either.Either<RoomAliasId.Type, ParseResult.ParseError> = (value) =>
		Schema.decodeEither(RoomAliasId)(value)
}

export declare namespace RoomAliasId {
	type Type = typeof RoomAliasId.Type
}
