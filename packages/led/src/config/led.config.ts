import * as Config from 'effect/Config'
import * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'

/**
 * LedConfig - Frame rate and the error rainbow
 *
 * | Variable                      | Default |
 * | ----------------------------- | ------- |
 * | `HEARO_LEDD_FRAME_HZ`         | `30`    |
 * | `HEARO_LEDD_ERROR_PERIOD_MS`  | `10000` |
 * | `HEARO_LEDD_ERROR_BRIGHTNESS` | `160`   |
 */
export class LedConfig extends Effect.Service<LedConfig>()('@hearo/led/config/LedConfig', {
	effect: Effect.gen(function* () {
		const config = yield* Config.all({
			errorBrightness: Config.integer('HEARO_LEDD_ERROR_BRIGHTNESS').pipe(Config.withDefault(160)),
			errorPeriodMs: Config.integer('HEARO_LEDD_ERROR_PERIOD_MS').pipe(Config.withDefault(10000)),
			frameHz: Config.number('HEARO_LEDD_FRAME_HZ').pipe(Config.withDefault(30)),
		})

		yield* Effect.logDebug('LED configuration loaded', config)

		return {
			error: { brightness: config.errorBrightness, periodMs: config.errorPeriodMs },
			frameInterval: Duration.millis(1000 / config.frameHz),
		} as const
	}),
}) {}
