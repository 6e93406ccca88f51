/**
 * AnyStateEvent: State event codec over the known content types
 *
 * @example
 *
 * ```typescript
 * const event = yield* AnyStateEvent.decodeJson(text)
 *
 * if (event.content instanceof AliasesEventContent) {
 * 	// event.content.aliases
 * }
 * ```
 */

import { makeStateEventCodec, type StateEvent } from '@room-state/schemas/envelope'

import { type AnyStateEventContent, AnyStateEventContentCodec } from './content/any-state-event-content.ts'

export const AnyStateEvent = makeStateEventCodec(AnyStateEventContentCodec)

export declare namespace AnyStateEvent {
	type Type = StateEvent<AnyStateEventContent.Type>
}
