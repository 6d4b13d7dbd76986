import * as Config from 'effect/Config'
import * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'

/**
 * PlayerConfig - Cadence and retry policy of the player peer
 *
 * | Variable                  | Default |
 * | ------------------------- | ------- |
 * | `HEARO_PLSM_TICK_MS`      | `200`   |
 * | `HEARO_PROGRESS_SAVE_MS`  | `2000`  |
 */
export class PlayerConfig extends Effect.Service<PlayerConfig>()('@hearo/player/config/PlayerConfig', {
	effect: Effect.gen(function* () {
		const config = yield* Config.all({
			progressSaveMs: Config.integer('HEARO_PROGRESS_SAVE_MS').pipe(Config.withDefault(2000)),
			tickMs: Config.integer('HEARO_PLSM_TICK_MS').pipe(Config.withDefault(200)),
		})

		yield* Effect.logDebug('Player configuration loaded', config)

		return {
			backoff: { initialMs: 5000, maxMs: 60000 },
			/** Upper bound of one playback backend call */
			callTimeout: Duration.seconds(10),
			progressSaveMs: config.progressSaveMs,
			tickInterval: Duration.millis(config.tickMs),
		} as const
	}),
}) {}
