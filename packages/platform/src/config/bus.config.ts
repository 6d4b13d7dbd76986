import * as Config from 'effect/Config'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

/**
 * BusConfig - Where endpoints live on the host
 *
 * | Variable                | Default      | Meaning                                        |
 * | ----------------------- | ------------ | ---------------------------------------------- |
 * | `HEARO_SOCKET_DIR`      | `/tmp/hearo` | Directory holding one `<name>.sock` per endpoint |
 * | `HEARO_SEND_TIMEOUT_MS` | `500`        | Upper bound for handing one frame to a peer    |
 */
export class BusConfig extends Effect.Service<BusConfig>()('@hearo/platform/config/BusConfig', {
	effect: Effect.gen(function* () {
		const config = yield* Config.all({
			sendTimeoutMs: Config.integer('HEARO_SEND_TIMEOUT_MS').pipe(Config.withDefault(500)),
			socketDir: Config.string('HEARO_SOCKET_DIR').pipe(Config.withDefault('/tmp/hearo')),
		})

		yield* Effect.logDebug('Bus configuration loaded', config)

		return config
	}),
}) {
	static readonly Test = (socketDir: string): Layer.Layer<BusConfig> =>
		Layer.succeed(BusConfig, new BusConfig({ sendTimeoutMs: 500, socketDir }))
}
