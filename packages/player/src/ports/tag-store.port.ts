import * as Context from 'effect/Context'
import type * as Effect from 'effect/Effect'
import type * as Option from 'effect/Option'
import * as Schema from 'effect/Schema'

import { Nfc } from '@hearo/schemas/messages'

export class TagStoreError extends Schema.TaggedError<TagStoreError>()('TagStoreError', {
	cause: Schema.optional(Schema.Defect),
	message: Schema.String,
	operation: Schema.Literal('resolve', 'saveProgress'),
}) {}

/**
 * TagRecord - Media mapped to a tag, with where playback last stopped
 */
export const TagRecord = Schema.Struct({
	lastPosMs: Schema.NonNegativeInt,
	/** Empty until the tag has been played */
	lastTrackUri: Schema.String,
	playlistUri: Schema.String,
	uid: Nfc.Events.TagUid,
})

export declare namespace TagRecord {
	type Type = typeof TagRecord.Type
}

/**
 * TagStorePort - Persistent tag to media storage
 */
export class TagStorePort extends Context.Tag('@hearo/player/ports/TagStorePort')<
	TagStorePort,
	{
		readonly resolve: (uid: string) => Effect.Effect<Option.Option<TagRecord.Type>, TagStoreError>

		/** Records the track and position playback of `uid` reached; unknown tags are left alone */
		readonly saveProgress: (progress: {
			readonly uid: string
			readonly trackUri: string
			readonly positionMs: number
		}) => Effect.Effect<void, TagStoreError>
	}
>() {}
