import * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as Queue from 'effect/Queue'
import * as Ref from 'effect/Ref'

import { type Color, LedStripError, LedStripPort } from '../ports/led-strip.port.ts'

/**
 * SimulatedStrip - Test controls behind a {@link LedStripPort}
 */
export class SimulatedStrip extends Context.Tag('@hearo/led/adapters/SimulatedStrip')<
	SimulatedStrip,
	{
		/** Waits for the next frame shown */
		readonly next: Effect.Effect<Color>
		/** Makes `show` fail until {@link recover} */
		readonly fail: (message: string) => Effect.Effect<void>
		readonly recover: Effect.Effect<void>
	}
>() {
	static readonly Test: Layer.Layer<LedStripPort | SimulatedStrip> = Layer.effectContext(
		Effect.gen(function* () {
			const frames = yield* Queue.unbounded<Color>()
			const failure = yield* Ref.make(Option.none<string>())

			const port = LedStripPort.of({
				show: (color) =>
					Ref.get(failure).pipe(
						Effect.flatMap(
							Option.match({
								onNone: () => Queue.offer(frames, color),
								onSome: (message) => Effect.fail(new LedStripError({ message })),
							}),
						),
						Effect.asVoid,
					),
			})

			const controls = SimulatedStrip.of({
				fail: (message) => Ref.set(failure, Option.some(message)),
				next: Queue.take(frames),
				recover: Ref.set(failure, Option.none()),
			})

			return Context.make(LedStripPort, port).pipe(Context.add(SimulatedStrip, controls))
		}),
	)

	/** Logs each frame at debug level, for running the daemon off the device */
	static readonly Console: Layer.Layer<LedStripPort> = Layer.succeed(
		LedStripPort,
		LedStripPort.of({
			show: (color) => Effect.logDebug('LED frame', color),
		}),
	)
}
