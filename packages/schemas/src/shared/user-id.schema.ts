/**
 * UserId: Fully qualified identifier of a user, e.g. `@carl:example.com`
 */

import type * as Either from 'effect/Either'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

import { Identifier } from './identifier.schema.ts'

const UserIdBrand: unique symbol = Symbol.for('@room-state/schemas/shared/UserId')

export class UserId extends Identifier('@', 'UserId').pipe(Schema.brand(UserIdBrand)) {
	/**
	 * Decode string to UserId with validation
	 *
	 * @example Check a sender
	 *
	 * ```typescript
	 * import * as Either from 'effect/Either'
	 *
	 * import { UserId } from './user-id.schema.ts'
	 *
	 * export const _isValid: boolean = Either.isRight(UserId.decodeEither('@carl:example.com'))
	 * ```
	 *
	 * @returns Either with UserId or ParseError
	 */
	static readonly decodeEither: (value: string) => Either.Either<UserId.Type, ParseResult.ParseError> = (value) =>
		Schema.decodeEither(UserId)(value)
}

export declare namespace UserId {
	type Type = typeof UserId.Type
}
