/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
/**
 * What the orchestrator reads off the bus
 *
 * Peers publish open payloads; most transitions hang on the event name alone. Each signal is therefore classified by
 * its name and keeps only the payload fields a transition reads (`uid` of an added tag, `button` and `interaction` of
 * a press, the new Wi-Fi state). Anything else in the payload is neither required nor checked.
 */

import * as Schema from 'effect/Schema'

import { Button, Lifecycle, Wire } from '@hearo/schemas/messages'

const named = <Tag extends string>(tag: Tag) => Schema.TaggedStruct(tag, {})

export const PeerStarted = Schema.Struct({ _tag: Lifecycle.Events.DaemonStartedName })
export const PeerStopped = Schema.Struct({ _tag: Lifecycle.Events.DaemonStoppedName })

/** The new state is optional; a state change without it still counts as a network report */
export const WifiStateChanged = Schema.TaggedStruct('WSM_EVENT_STATE_CHANGED', {
	to: Schema.optional(Schema.String).pipe(Schema.fromKey('new')),
})

export const TagAdded = Schema.TaggedStruct('NFC_EVENT_TAG_ADDED', { uid: Schema.NonEmptyTrimmedString })

export const ButtonPressed = Schema.TaggedStruct('BD_EVENT_BUTTON', {
	button: Schema.String,
	interaction: Button.Events.InteractionKind,
})

export const Signal = Schema.Union(
	PeerStarted,
	PeerStopped,
	named('WSM_EVENT_WIFI_CONNECTED'),
	named('WSM_EVENT_WIFI_LOST'),
	WifiStateChanged,
	named('PLSM_EVENT_AUTHENTICATED'),
	named('PLSM_EVENT_AUTH_LOST'),
	named('PLSM_EVENT_AUTH_FAILED'),
	named('PLSM_EVENT_DISCONNECTED'),
	named('PLSM_EVENT_TAG_RESOLVED'),
	named('PLSM_EVENT_PLAY_STOPPED'),
	TagAdded,
	named('NFC_EVENT_TAG_REMOVED'),
	ButtonPressed,
	named('POWD_EVENT_BATTERY_CRITICAL'),
)

export declare namespace Signal {
	type Type = typeof Signal.Type
}

/**
 * Classifies one bus event; events the orchestrator has no use for fail with a `ParseError`.
 *
 * @example
 *
 * ```typescript
 * yield* decodeSignal({ name: 'PLSM_EVENT_PLAY_STOPPED', payload: {} })
 * // { _tag: 'PLSM_EVENT_PLAY_STOPPED' }
 * ```
 */
export const decodeSignal = Wire.decode(Signal)
