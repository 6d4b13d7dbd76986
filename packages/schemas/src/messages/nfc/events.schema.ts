/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
/**
 * NFC daemon events
 *
 * Presence of a tag is debounced the same way as a button: `TagAdded` on stable presence, `TagPresent` as a periodic
 * heartbeat while it stays, `TagRemoved` once absence has been stable (or another tag took its place).
 */

import * as Schema from 'effect/Schema'

/**
 * TagUid - Hex encoded tag identifier as read from the reader (e.g. `04AA19C2`)
 */
export const TagUid = Schema.NonEmptyTrimmedString

export class NfcReady extends Schema.TaggedClass<NfcReady>()('NFC_EVENT_READY', {}) {
	static readonly Tag = NfcReady._tag
}

/**
 * TagAdded - A tag is stably present on the reader
 *
 * **Wire Format (DTO)**:
 *
 * ```json
 * { "uid": "04AA19C2", "tech": "ISO14443", "ats": null }
 * ```
 */
export class TagAdded extends Schema.TaggedClass<TagAdded>()('NFC_EVENT_TAG_ADDED', {
	ats: Schema.NullOr(Schema.String),
	tech: Schema.String,
	uid: TagUid,
}) {
	static readonly Tag = TagAdded._tag
}

export class TagPresent extends Schema.TaggedClass<TagPresent>()('NFC_EVENT_TAG_PRESENT', {
	uid: TagUid,
}) {
	static readonly Tag = TagPresent._tag
}

/**
 * TagRemoved - The tracked tag left the reader
 *
 * `reason` is `timeout` when absence was stable for the release window, `replaced` when a different tag was read.
 */
export class TagRemoved extends Schema.TaggedClass<TagRemoved>()('NFC_EVENT_TAG_REMOVED', {
	reason: Schema.Literal('timeout', 'replaced'),
	uid: TagUid,
}) {
	static readonly Tag = TagRemoved._tag
}

export declare namespace TagAdded {
	type Type = Schema.Schema.Type<typeof TagAdded>
	type Dto = Schema.Schema.Encoded<typeof TagAdded>
}

export declare namespace TagRemoved {
	type Type = Schema.Schema.Type<typeof TagRemoved>
	type Dto = Schema.Schema.Encoded<typeof TagRemoved>
}

export const Events = Schema.Union(NfcReady, TagAdded, TagPresent, TagRemoved)

export declare namespace Events {
	type Type = Schema.Schema.Type<typeof Events>
	type Tag = Type['_tag']
}
