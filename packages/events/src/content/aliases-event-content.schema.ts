/**
 * `m.room.aliases`: Room aliases published by one server
 *
 * The state key is the server name whose aliases are listed. The list is a `Data` array, so two contents with the same
 * aliases are `Equal.equals`; build it with `Data.array`.
 *
 * @example
 *
 * ```typescript
 * new AliasesEventContent({ aliases: Data.array([RoomAliasId.make('#lobby:example.org')]) })
 * ```
 */

import * as Schema from 'effect/Schema'

import { RoomAliasId } from '@room-state/schemas/shared'

export class AliasesEventContent extends Schema.Class<AliasesEventContent>('AliasesEventContent')({
	aliases: Schema.Data(Schema.Array(RoomAliasId)),
}) {
	static readonly EventType = 'm.room.aliases'

	get eventType(): typeof AliasesEventContent.EventType {
		return AliasesEventContent.EventType
	}
}
