import * as Config from 'effect/Config'
import * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'

/**
 * WifiConfig - Interface, access point and cadence of the Wi-Fi peer
 *
 * | Variable               | Default           |
 * | ---------------------- | ----------------- |
 * | `HEARO_WLAN_IFACE`     | `wlan0`           |
 * | `HEARO_AP_SSID`        | `Hearo-Setup`     |
 * | `HEARO_AP_CHANNEL`     | `6`               |
 * | `HEARO_PROBE_HOST`     | `api.spotify.com` |
 * | `HEARO_WSM_TICK_MS`    | `500`             |
 */
export class WifiConfig extends Effect.Service<WifiConfig>()('@hearo/wifi/config/WifiConfig', {
	effect: Effect.gen(function* () {
		const config = yield* Config.all({
			apChannel: Config.integer('HEARO_AP_CHANNEL').pipe(Config.withDefault(6)),
			apSsid: Config.string('HEARO_AP_SSID').pipe(Config.withDefault('Hearo-Setup')),
			iface: Config.string('HEARO_WLAN_IFACE').pipe(Config.withDefault('wlan0')),
			probeHost: Config.string('HEARO_PROBE_HOST').pipe(Config.withDefault('api.spotify.com')),
			tickMs: Config.integer('HEARO_WSM_TICK_MS').pipe(Config.withDefault(500)),
		})

		yield* Effect.logDebug('Wi-Fi configuration loaded', config)

		return {
			accessPoint: { channel: config.apChannel, security: 'WPA2-PSK', ssid: config.apSsid },
			backoff: { initialMs: 5000, maxMs: 60000 },
			/** Upper bound of one network stack call */
			callTimeout: Duration.seconds(5),
			iface: config.iface,
			internetCheckMs: 10000,
			probeHost: config.probeHost,
			stationRefreshMs: 5000,
			tickInterval: Duration.millis(config.tickMs),
		} as const
	}),
}) {}
