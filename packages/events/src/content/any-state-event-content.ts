/**
 * AnyStateEventContent: The state event types this package knows about
 *
 * Adding an event type means adding its class to {@link AnyStateEventContent} and to the decoder table below; the
 * envelope codec itself does not change.
 */

import * as Either from 'effect/Either'
import * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

import { ContentError, type StateEventContentCodec } from '@room-state/schemas/content'
import type { RawJson } from '@room-state/schemas/json'

import { AliasesEventContent } from './aliases-event-content.schema.ts'
import { AvatarEventContent } from './avatar-event-content.schema.ts'
import { NameEventContent } from './name-event-content.schema.ts'
import { TopicEventContent } from './topic-event-content.schema.ts'

export const AnyStateEventContent = Schema.Union(
	AliasesEventContent,
	AvatarEventContent,
	NameEventContent,
	TopicEventContent,
)

export declare namespace AnyStateEventContent {
	type Type = typeof AnyStateEventContent.Type

	/**
	 * EventType - Union of the known discriminators
	 */
	type EventType = Type['eventType']
}

type ContentDecoder = (raw: RawJson) => Either.Either<AnyStateEventContent.Type, ParseResult.ParseError>

const fromText =
	<A extends AnyStateEventContent.Type, I>(schema: Schema.Schema<A, I>): ContentDecoder =>
	(raw) =>
		Schema.decodeEither(Schema.parseJson(schema))(raw.text)

const decoders: ReadonlyMap<string, ContentDecoder> = new Map<AnyStateEventContent.EventType, ContentDecoder>([
	[AliasesEventContent.EventType, fromText(AliasesEventContent)],
	[AvatarEventContent.EventType, fromText(AvatarEventContent)],
	[NameEventContent.EventType, fromText(NameEventContent)],
	[TopicEventContent.EventType, fromText(TopicEventContent)],
])

/**
 * The known event types, in registration order
 */
export const knownEventTypes: ReadonlyArray<string> = [...decoders.keys()]

const invalidContent = (eventType: string, error: ParseResult.ParseError) =>
	new ContentError({ details: ParseResult.TreeFormatter.formatErrorSync(error), eventType, reason: 'InvalidContent' })

export const AnyStateEventContentCodec: StateEventContentCodec<AnyStateEventContent.Type> = {
	fromParts: (eventType, raw) => {
		const decode = decoders.get(eventType)

		if (decode === undefined) {
			return Either.left(
				new ContentError({
					details: `Unknown state event type ${eventType}. Known: ${knownEventTypes.join(', ')}`,
					eventType,
					reason: 'UnknownEventType',
				}),
			)
		}

		return Either.mapLeft(decode(raw), (error) => invalidContent(eventType, error))
	},
	toJson: (content) =>
		Either.mapLeft(Schema.encodeEither(AnyStateEventContent)(content), (error) => invalidContent(content.eventType, error)),
}
