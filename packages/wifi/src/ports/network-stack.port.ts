import * as Context from 'effect/Context'
import type * as Effect from 'effect/Effect'

import type { PeerUnavailable } from '@hearo/platform'

/**
 * What the station interface reports; every field is `null` when the OS tools do not know it
 */
export interface StationReport {
	readonly ssid: string | null
	readonly ip: string | null
	readonly rssi: number | null
}

/**
 * NetworkStackPort - OS network tooling the Wi-Fi peer drives
 *
 * Every failure leaves the port as a classified {@link PeerUnavailable}.
 */
export class NetworkStackPort extends Context.Tag('@hearo/wifi/ports/NetworkStackPort')<
	NetworkStackPort,
	{
		/** Fails with `ERR_NO_WPA_CLI` when the supplicant tooling is missing */
		readonly checkStack: Effect.Effect<void, PeerUnavailable>
		readonly station: Effect.Effect<StationReport, PeerUnavailable>
		/** Asks the supplicant to reassociate */
		readonly reconnect: Effect.Effect<void, PeerUnavailable>
		/** One reachability probe of the streaming backend */
		readonly internetReachable: Effect.Effect<boolean, PeerUnavailable>
		readonly startAccessPoint: Effect.Effect<void, PeerUnavailable>
		readonly stopAccessPoint: Effect.Effect<void, PeerUnavailable>
	}
>() {}
