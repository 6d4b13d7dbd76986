/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
/**
 * Wi-Fi peer events
 *
 * `WifiConnected` and `WifiLost` are the network-status events the orchestrator folds; the access point events are
 * informational.
 */

import * as Schema from 'effect/Schema'

export class AccessPointStarted extends Schema.TaggedClass<AccessPointStarted>()('WSM_EVENT_WIFI_AP_STARTED', {
	channel: Schema.Int,
	security: Schema.String,
	ssid: Schema.String,
}) {
	static readonly Tag = AccessPointStarted._tag
}

export class AccessPointStopped extends Schema.TaggedClass<AccessPointStopped>()('WSM_EVENT_WIFI_AP_STOPPED', {
	reason: Schema.String,
}) {
	static readonly Tag = AccessPointStopped._tag
}

/**
 * WifiConnected - Station link is up and the internet is reachable
 *
 * **Wire Format (DTO)**:
 *
 * ```json
 * { "ssid": "home", "ip": "192.168.1.23", "rssi": -52 }
 * ```
 */
export class WifiConnected extends Schema.TaggedClass<WifiConnected>()('WSM_EVENT_WIFI_CONNECTED', {
	ip: Schema.String,
	rssi: Schema.NullOr(Schema.Int),
	ssid: Schema.String,
}) {
	static readonly Tag = WifiConnected._tag
}

export const LostReason = Schema.Literal('link_down', 'no_ip', 'no_internet')

export declare namespace LostReason {
	type Type = typeof LostReason.Type
}

/**
 * WifiLost - Connectivity was lost; the peer falls back to access point mode
 */
export class WifiLost extends Schema.TaggedClass<WifiLost>()('WSM_EVENT_WIFI_LOST', {
	failStreak: Schema.propertySignature(Schema.NonNegativeInt).pipe(Schema.fromKey('fail_streak')),
	ip: Schema.NullOr(Schema.String),
	reason: LostReason,
	ssid: Schema.NullOr(Schema.String),
}) {
	static readonly Tag = WifiLost._tag
}

export const Events = Schema.Union(AccessPointStarted, AccessPointStopped, WifiConnected, WifiLost)

export declare namespace Events {
	type Type = Schema.Schema.Type<typeof Events>
	type Tag = Type['_tag']
}
