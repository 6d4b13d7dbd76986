import * as Config from 'effect/Config'
import * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'

/**
 * PowerConfig - Which supplies to read and how often to report
 *
 * | Variable                  | Default                   |
 * | ------------------------- | ------------------------- |
 * | `HEARO_BATTERY_SUPPLY`    | `battery`                 |
 * | `HEARO_EXTERNAL_SUPPLY`   | `usb`                     |
 * | `HEARO_POWER_SUPPLY_ROOT` | `/sys/class/power_supply` |
 * | `HEARO_POWD_REPORT_MS`    | `30000`                   |
 */
export class PowerConfig extends Effect.Service<PowerConfig>()('@hearo/power/config/PowerConfig', {
	effect: Effect.gen(function* () {
		const config = yield* Config.all({
			battery: Config.string('HEARO_BATTERY_SUPPLY').pipe(Config.withDefault('battery')),
			external: Config.string('HEARO_EXTERNAL_SUPPLY').pipe(Config.withDefault('usb')),
			reportMs: Config.integer('HEARO_POWD_REPORT_MS').pipe(Config.withDefault(30000)),
			root: Config.string('HEARO_POWER_SUPPLY_ROOT').pipe(Config.withDefault('/sys/class/power_supply')),
		})

		yield* Effect.logDebug('Power configuration loaded', config)

		return {
			battery: config.battery,
			external: config.external,
			reportInterval: Duration.millis(config.reportMs),
			root: config.root,
		} as const
	}),
}) {}
