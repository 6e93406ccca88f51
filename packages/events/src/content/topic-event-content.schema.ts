/**
 * `m.room.topic`: Room topic
 */

import * as Schema from 'effect/Schema'

export class TopicEventContent extends Schema.Class<TopicEventContent>('TopicEventContent')({
	topic: Schema.String,
}) {
	static readonly EventType = 'm.room.topic'

	get eventType(): typeof TopicEventContent.EventType {
		return TopicEventContent.EventType
	}
}
