/**
 * `m.room.avatar`: Picture shown for the room
 *
 * Image dimensions use the short wire keys `h` and `w`; the domain model spells them out. Encrypted thumbnails
 * (`thumbnail_file`) are not modelled and the key is dropped on decode.
 */

import * as Schema from 'effect/Schema'

const Dimension = Schema.Int.pipe(Schema.nonNegative())

export class ThumbnailInfo extends Schema.Class<ThumbnailInfo>('ThumbnailInfo')({
	height: Schema.optionalWith(Dimension, { as: 'Option', exact: true }).pipe(Schema.fromKey('h')),
	mimetype: Schema.optionalWith(Schema.String, { as: 'Option', exact: true }),
	/** Bytes */
	size: Schema.optionalWith(Dimension, { as: 'Option', exact: true }),
	width: Schema.optionalWith(Dimension, { as: 'Option', exact: true }).pipe(Schema.fromKey('w')),
}) {}

export class ImageInfo extends Schema.Class<ImageInfo>('ImageInfo')({
	height: Schema.optionalWith(Dimension, { as: 'Option', exact: true }).pipe(Schema.fromKey('h')),
	mimetype: Schema.optionalWith(Schema.String, { as: 'Option', exact: true }),
	size: Schema.optionalWith(Dimension, { as: 'Option', exact: true }),
	thumbnailInfo: Schema.optionalWith(ThumbnailInfo, { as: 'Option', exact: true }).pipe(Schema.fromKey('thumbnail_info')),
	/** `mxc://` URI of the thumbnail */
	thumbnailUrl: Schema.optionalWith(Schema.String, { as: 'Option', exact: true }).pipe(Schema.fromKey('thumbnail_url')),
	width: Schema.optionalWith(Dimension, { as: 'Option', exact: true }).pipe(Schema.fromKey('w')),
}) {}

export class AvatarEventContent extends Schema.Class<AvatarEventContent>('AvatarEventContent')({
	info: Schema.optionalWith(ImageInfo, { as: 'Option', exact: true }),
	url: Schema.String,
}) {
	static readonly EventType = 'm.room.avatar'

	get eventType(): typeof AvatarEventContent.EventType {
		return AvatarEventContent.EventType
	}
}
