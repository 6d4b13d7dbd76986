/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
/**
 * Player peer commands
 *
 * Sent by the orchestrator without a reply endpoint; operators may send them with one to observe ack and result.
 */

import * as Schema from 'effect/Schema'

import { Ping, SetDebug } from '../common/commands.schema.ts'
import { TagUid } from '../nfc/events.schema.ts'

/**
 * PlayTag - resolve a tag to media and start (or resume) playback
 *
 * **Wire format**: `{ "uid": "04AA" }`
 */
export class PlayTag extends Schema.TaggedClass<PlayTag>()('PLSM_COMMAND_PLAY_TAG', {
	uid: TagUid,
}) {
	static readonly Tag = PlayTag._tag
}

export class Stop extends Schema.TaggedClass<Stop>()('PLSM_COMMAND_STOP', {}) {
	static readonly Tag = Stop._tag
}

export class Next extends Schema.TaggedClass<Next>()('PLSM_COMMAND_NEXT', {}) {
	static readonly Tag = Next._tag
}

export class Previous extends Schema.TaggedClass<Previous>()('PLSM_COMMAND_PREVIOUS', {}) {
	static readonly Tag = Previous._tag
}

/**
 * Seek - move relative to the current position; the target is clamped at 0
 *
 * **Wire format**: `{ "delta_ms": -15000 }`
 */
export class Seek extends Schema.TaggedClass<Seek>()('PLSM_COMMAND_SEEK', {
	deltaMs: Schema.propertySignature(Schema.Int).pipe(Schema.fromKey('delta_ms')),
}) {
	static readonly Tag = Seek._tag
}

/**
 * Play - start an explicit URI, bypassing tag resolution
 */
export class Play extends Schema.TaggedClass<Play>()('PLSM_COMMAND_PLAY', {
	positionMs: Schema.optionalWith(Schema.NonNegativeInt, { default: () => 0 }).pipe(Schema.fromKey('position_ms')),
	uri: Schema.NonEmptyTrimmedString,
}) {
	static readonly Tag = Play._tag
}

export class PlayerStatus extends Schema.TaggedClass<PlayerStatus>()('PLSM_COMMAND_STATUS', {}) {
	static readonly Tag = PlayerStatus._tag
}

/**
 * Shutdown - persist progress and stop the daemon
 */
export class Shutdown extends Schema.TaggedClass<Shutdown>()('PLSM_COMMAND_SHUTDOWN', {}) {
	static readonly Tag = Shutdown._tag
}

export const PlayerPing = Ping('PLSM_CMD_PING')
export const PlayerSetDebug = SetDebug('PLSM_CMD_SET_DEBUG')

export const Commands = Schema.Union(
	PlayerPing,
	PlayerSetDebug,
	PlayTag,
	Stop,
	Next,
	Previous,
	Seek,
	Play,
	PlayerStatus,
	Shutdown,
)

export declare namespace Commands {
	type Type = Schema.Schema.Type<typeof Commands>
	type Tag = Type['_tag']
}
