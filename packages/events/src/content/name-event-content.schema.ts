/**
 * `m.room.name`: Human-readable room name
 */

import * as Schema from 'effect/Schema'

export const MAX_ROOM_NAME_LENGTH = 255

export class NameEventContent extends Schema.Class<NameEventContent>('NameEventContent')({
	name: Schema.String.pipe(Schema.maxLength(MAX_ROOM_NAME_LENGTH)),
}) {
	static readonly EventType = 'm.room.name'

	get eventType(): typeof NameEventContent.EventType {
		return NameEventContent.EventType
	}
}
