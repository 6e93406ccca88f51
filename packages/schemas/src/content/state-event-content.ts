/**
 * Content capability interface
 *
 * The envelope codec knows nothing about individual event types. A content type plugs in by exposing its
 * discriminator on every value and by supplying a {@link StateEventContentCodec} that turns the raw text of `content`
 * (and `prev_content`) into a typed value once the envelope's `type` is known.
 */

import type * as Either from 'effect/Either'
import * as Schema from 'effect/Schema'

import type { RawJson } from '../json/index.ts'

/**
 * ContentError: The content codec rejected an event type or a payload
 */
export class ContentError extends Schema.TaggedError<ContentError>()('ContentError', {
	/** The envelope's `type` */
	eventType: Schema.String,
	reason: Schema.Literal('UnknownEventType', 'InvalidContent'),
	details: Schema.String,
}) {}

/**
 * A content value that can be embedded in a state event
 */
export interface StateEventContent {
	/** Discriminator written to the envelope's `type` field */
	readonly eventType: string
}

export interface StateEventContentCodec<C extends StateEventContent> {
	/**
	 * Builds a content value from the discriminator and the unparsed payload
	 */
	readonly fromParts: (eventType: string, raw: RawJson) => Either.Either<C, ContentError>

	/**
	 * The wire form of a content value, ready for `JSON.stringify`
	 */
	readonly toJson: (content: C) => Either.Either<unknown, ContentError>
}
