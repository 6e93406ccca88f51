/**
 * State event decoder
 *
 * Wire object → {@link StateEvent}. Fields may arrive in any order, and `content` cannot be read before `type` is
 * known, so decoding runs in two phases:
 *
 * 1. One pass over the top-level entries in source order. Scalar fields are validated as they are seen; `content` and
 *    `prev_content` are kept as raw text. A repeated field fails at once.
 * 2. Completeness checks in a fixed order, then content resolution through the content codec.
 */

import * as Either from 'effect/Either'
import * as Option from 'effect/Option'
import * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

import type { ExcessPropertyPolicy } from '@room-state/platform/config'

import type { StateEventContent, StateEventContentCodec } from '../content/index.ts'
import type { RawEntry, RawJson } from '../json/index.ts'
import { EventId, emptyUnsignedData, RoomId, type UnsignedData, UnsignedDataFromWire, UserId } from '../shared/index.ts'
import { fromWire, isRepresentable, TimestampOverflowError, WireTimestampLiteral } from '../timestamp/index.ts'
import {
	DuplicateFieldError,
	InvalidFieldError,
	MissingFieldError,
	type StateEventDecodeError,
	UnknownFieldError,
} from './state-event.errors.ts'
import { StateEvent } from './state-event.ts'

export interface DecodeOptions {
	/** What to do with top-level keys the envelope does not define. Defaults to `'ignore'`. */
	readonly onExcessProperty?: ExcessPropertyPolicy
}

/**
 * Value captured for each recognized wire field during the entry walk
 */
interface Captured {
	readonly type: string
	readonly content: RawJson
	readonly event_id: EventId.Type
	readonly sender: UserId.Type
	readonly origin_server_ts: number
	readonly room_id: RoomId.Type
	readonly state_key: string
	readonly prev_content: RawJson
	readonly unsigned: UnsignedData.Type
}

type WireField = keyof Captured

const fromText =
	<A, I>(schema: Schema.Schema<A, I>) =>
	(raw: RawJson): Either.Either<A, ParseResult.ParseError> =>
		Schema.decodeEither(Schema.parseJson(schema))(raw.text)

const fromLiteral =
	<A>(schema: Schema.Schema<A, string>) =>
	(raw: RawJson): Either.Either<A, ParseResult.ParseError> =>
		Schema.decodeEither(schema)(raw.text)

const deferred = (raw: RawJson): Either.Either<RawJson, ParseResult.ParseError> => Either.right(raw)

const fieldParsers: { readonly [K in WireField]: (raw: RawJson) => Either.Either<Captured[K], ParseResult.ParseError> } =
	{
		content: deferred,
		event_id: fromText(EventId),
		origin_server_ts: fromLiteral(WireTimestampLiteral),
		prev_content: deferred,
		room_id: fromText(RoomId),
		sender: fromText(UserId),
		state_key: fromText(Schema.String),
		type: fromText(Schema.String),
		unsigned: fromText(UnsignedDataFromWire),
	}

const isWireField = (key: string): key is WireField => Object.hasOwn(fieldParsers, key)

const capture = <K extends WireField>(
	slots: { -readonly [F in WireField]?: Captured[F] },
	field: K,
	raw: RawJson,
): Either.Either<void, InvalidFieldError> =>
	fieldParsers[field](raw).pipe(
		Either.map((value) => {
			slots[field] = value
		}),
		Either.mapLeft(
			(error) => new InvalidFieldError({ details: ParseResult.TreeFormatter.formatErrorSync(error), field }),
		),
	)

const present = <A>(value: A | undefined, field: WireField): Either.Either<A, MissingFieldError> =>
	value === undefined ? Either.left(new MissingFieldError({ field })) : Either.right(value)

/**
 * Decodes a state event from its top-level entries, as read by `objectEntries`
 */
export const decodeEntries =
	<C extends StateEventContent>(contentCodec: StateEventContentCodec<C>) =>
	(
		entries: ReadonlyArray<RawEntry>,
		options: DecodeOptions = {},
	): Either.Either<StateEvent<C>, StateEventDecodeError> => {
		const slots: { -readonly [F in WireField]?: Captured[F] } = {}

		for (const { key, value } of entries) {
			if (!isWireField(key)) {
				if (options.onExcessProperty === 'error') {
					return Either.left(new UnknownFieldError({ field: key }))
				}
				continue
			}

			if (slots[key] !== undefined) {
				return Either.left(new DuplicateFieldError({ field: key }))
			}

			const captured = capture(slots, key, value)
			if (Either.isLeft(captured)) {
				return Either.left(captured.left)
			}
		}

		return Either.gen(function* () {
			const eventType = yield* present(slots.type, 'type')
			const content = yield* contentCodec.fromParts(eventType, yield* present(slots.content, 'content'))
			const prevContent =
				slots.prev_content === undefined
					? Option.none<C>()
					: Option.some(yield* contentCodec.fromParts(eventType, slots.prev_content))

			const eventId = yield* present(slots.event_id, 'event_id')
			const sender = yield* present(slots.sender, 'sender')
			const millis = yield* present(slots.origin_server_ts, 'origin_server_ts')
			const roomId = yield* present(slots.room_id, 'room_id')
			const stateKey = yield* present(slots.state_key, 'state_key')

			if (!isRepresentable(millis)) {
				return yield* Either.left(new TimestampOverflowError({ millis }))
			}

			return new StateEvent<C>({
				content,
				eventId,
				originServerTs: fromWire(millis),
				prevContent,
				roomId,
				sender,
				stateKey,
				unsigned: slots.unsigned ?? emptyUnsignedData,
			})
		})
	}
