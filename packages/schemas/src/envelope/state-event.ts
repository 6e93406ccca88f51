/**
 * StateEvent: Envelope around one piece of room state
 *
 * A state event is keyed by `(roomId, content.eventType, stateKey)`: a newer event with the same key replaces the
 * older one, whose content the server may echo back as `prevContent`. The envelope is generic over its content; the
 * content type decides the discriminator and how the payload is read and written.
 */

import * as Data from 'effect/Data'
import type * as DateTime from 'effect/DateTime'
import type * as Option from 'effect/Option'

import type { StateEventContent } from '../content/index.ts'
import type { EventId, RoomId, UnsignedData, UserId } from '../shared/index.ts'

export interface StateEventFields<C extends StateEventContent> {
	readonly content: C
	readonly eventId: EventId.Type
	readonly sender: UserId.Type
	/** Wall-clock time at the originating homeserver when the event was sent */
	readonly originServerTs: DateTime.Utc
	readonly roomId: RoomId.Type
	/** May be empty: most room-wide state uses `''` */
	readonly stateKey: string
	/** Previous value for the same state key; always the same event type as `content` */
	readonly prevContent: Option.Option<C>
	readonly unsigned: UnsignedData.Type
}

export class StateEvent<C extends StateEventContent> extends Data.Class<StateEventFields<C>> {}

export declare namespace StateEvent {
	/**
	 * Wire object, keys in the order the encoder writes them
	 */
	interface Encoded {
		readonly type: string
		readonly content: unknown
		readonly event_id: string
		readonly sender: string
		readonly origin_server_ts: number
		readonly room_id: string
		readonly state_key: string
		readonly prev_content?: unknown
		readonly unsigned?: UnsignedData.Encoded
	}
}
