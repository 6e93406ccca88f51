/**
 * State event encoder
 *
 * {@link StateEvent} → wire object. Keys are written in a fixed order (`type`, `content`, `event_id`, `sender`,
 * `origin_server_ts`, `room_id`, `state_key`, then the optional `prev_content` and `unsigned`), each exactly once. An
 * absent `prev_content` and an empty `unsigned` are left out rather than written as `null` or `{}`.
 */

import * as Either from 'effect/Either'
import * as Option from 'effect/Option'
import * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

import { ContentError, type StateEventContent, type StateEventContentCodec } from '../content/index.ts'
import { isEmptyUnsignedData, type UnsignedData, UnsignedDataFields } from '../shared/index.ts'
import { toWire } from '../timestamp/index.ts'
import { InvalidFieldError, type StateEventEncodeError } from './state-event.errors.ts'
import type { StateEvent } from './state-event.ts'

const encodeUnsigned = (
	unsigned: UnsignedData.Type,
): Either.Either<{ readonly unsigned?: UnsignedData.Encoded }, InvalidFieldError> =>
	isEmptyUnsignedData(unsigned)
		? Either.right({})
		: Schema.encodeEither(UnsignedDataFields)(unsigned).pipe(
				Either.map((encoded) => ({ unsigned: encoded })),
				Either.mapLeft(
					(error) =>
						new InvalidFieldError({ details: ParseResult.TreeFormatter.formatErrorSync(error), field: 'unsigned' }),
				),
			)

export const encodeStateEvent =
	<C extends StateEventContent>(contentCodec: StateEventContentCodec<C>) =>
	(event: StateEvent<C>): Either.Either<StateEvent.Encoded, StateEventEncodeError> =>
		Either.gen(function* () {
			const eventType = event.content.eventType
			const content = yield* contentCodec.toJson(event.content)
			const originServerTs = yield* toWire(event.originServerTs)

			let prevContent: { readonly prev_content?: unknown } = {}
			if (Option.isSome(event.prevContent)) {
				const previous = event.prevContent.value
				if (previous.eventType !== eventType) {
					return yield* Either.left(
						new ContentError({
							details: `prev_content has event type ${previous.eventType}, content has ${eventType}`,
							eventType: previous.eventType,
							reason: 'InvalidContent',
						}),
					)
				}
				prevContent = { prev_content: yield* contentCodec.toJson(previous) }
			}

			const unsigned = yield* encodeUnsigned(event.unsigned)

			// wire order, not alphabetical
			return {
				type: eventType,
				content,
				event_id: event.eventId,
				sender: event.sender,
				origin_server_ts: originServerTs,
				room_id: event.roomId,
				state_key: event.stateKey,
				...prevContent,
				...unsigned,
			}
		})
