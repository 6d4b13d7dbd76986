/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
/**
 * Player peer events
 *
 * Auth failures are reported distinctly from generic unavailability so the orchestrator can fall back to `Offline`
 * instead of `NoNetwork`.
 */

import * as Schema from 'effect/Schema'

import { TagUid } from '../nfc/events.schema.ts'

export class Authenticated extends Schema.TaggedClass<Authenticated>()('PLSM_EVENT_AUTHENTICATED', {}) {
	static readonly Tag = Authenticated._tag
}

/**
 * AuthFailed - Credentials or session were rejected
 *
 * **Wire format**: `{ "reason": "startup_auth_failed:invalid_grant" }`
 */
export class AuthFailed extends Schema.TaggedClass<AuthFailed>()('PLSM_EVENT_AUTH_FAILED', {
	reason: Schema.String,
}) {
	static readonly Tag = AuthFailed._tag
}

/**
 * AuthLost - A previously valid session can no longer be used (e.g. the playback device vanished)
 */
export class AuthLost extends Schema.TaggedClass<AuthLost>()('PLSM_EVENT_AUTH_LOST', {
	reason: Schema.String,
}) {
	static readonly Tag = AuthLost._tag
}

export class Disconnected extends Schema.TaggedClass<Disconnected>()('PLSM_EVENT_DISCONNECTED', {
	reason: Schema.String,
}) {
	static readonly Tag = Disconnected._tag
}

/**
 * TagResolved - A tag mapped to media and playback started
 *
 * **Wire format**: `{ "uid": "04AA", "uri": "spotify:track:abc", "position_ms": 42000 }`
 */
export class TagResolved extends Schema.TaggedClass<TagResolved>()('PLSM_EVENT_TAG_RESOLVED', {
	positionMs: Schema.propertySignature(Schema.NonNegativeInt).pipe(Schema.fromKey('position_ms')),
	uid: TagUid,
	uri: Schema.String,
}) {
	static readonly Tag = TagResolved._tag
}

export class TagUnknown extends Schema.TaggedClass<TagUnknown>()('PLSM_EVENT_TAG_UNKNOWN', {
	uid: TagUid,
}) {
	static readonly Tag = TagUnknown._tag
}

export class PlayStarted extends Schema.TaggedClass<PlayStarted>()('PLSM_EVENT_PLAY_STARTED', {
	positionMs: Schema.propertySignature(Schema.NonNegativeInt).pipe(Schema.fromKey('position_ms')),
	uri: Schema.String,
}) {
	static readonly Tag = PlayStarted._tag
}

export class PlayStopped extends Schema.TaggedClass<PlayStopped>()('PLSM_EVENT_PLAY_STOPPED', {
	reason: Schema.String,
}) {
	static readonly Tag = PlayStopped._tag
}

/**
 * PlaybackError - A transient backend failure; the player stays up and retries
 */
export class PlaybackError extends Schema.TaggedClass<PlaybackError>()('PLSM_EVENT_PLAYBACK_ERROR', {
	code: Schema.String,
	message: Schema.String,
}) {
	static readonly Tag = PlaybackError._tag
}

export const Events = Schema.Union(
	Authenticated,
	AuthFailed,
	AuthLost,
	Disconnected,
	TagResolved,
	TagUnknown,
	PlayStarted,
	PlayStopped,
	PlaybackError,
)

export declare namespace Events {
	type Type = Schema.Schema.Type<typeof Events>
	type Tag = Type['_tag']
}
