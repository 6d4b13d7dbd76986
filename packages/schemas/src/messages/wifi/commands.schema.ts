/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
import * as Schema from 'effect/Schema'

import { Ping, SetDebug } from '../common/commands.schema.ts'

/**
 * Status - snapshot of the Wi-Fi peer, answered without side effects
 *
 * **Result payload**:
 *
 * ```json
 * {
 * 	"state": "Connected",
 * 	"ap_mode": { "active": false, "ssid": "Hearo-Setup", "clients": 0 },
 * 	"station": { "connected": true, "ssid": "home", "ip": "192.168.1.23", "rssi": -52 },
 * 	"internet": { "spotify_reachable": true, "last_check_ms_ago": 1200, "fail_streak": 0 },
 * 	"uptime_ms": 360000,
 * 	"last_error_code": null
 * }
 * ```
 */
export class WifiStatus extends Schema.TaggedClass<WifiStatus>()('WSM_COMMAND_STATUS', {}) {
	static readonly Tag = WifiStatus._tag
}

export const WifiPing = Ping('WSM_CMD_PING')
export const WifiSetDebug = SetDebug('WSM_CMD_SET_DEBUG')

export const Commands = Schema.Union(WifiPing, WifiSetDebug, WifiStatus)

export declare namespace Commands {
	type Type = Schema.Schema.Type<typeof Commands>
	type Tag = Type['_tag']
}
