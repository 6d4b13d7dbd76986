import * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as HashMap from 'effect/HashMap'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as Ref from 'effect/Ref'

import type { Level } from '../domain/debounce.domain.ts'
import { GpioError, GpioInputPort } from '../ports/gpio-input.port.ts'

type Line = { readonly _tag: 'Level'; readonly level: Level } | { readonly _tag: 'Broken'; readonly message: string }

/**
 * SimulatedGpio - Test controls behind a {@link GpioInputPort}
 *
 * Every line reads `released` until a test changes it.
 */
export class SimulatedGpio extends Context.Tag('@hearo/input/adapters/SimulatedGpio')<
	SimulatedGpio,
	{
		readonly set: (pin: number, level: Level) => Effect.Effect<void>
		/** Makes reads of `pin` fail until the next {@link set} */
		readonly break: (pin: number, message: string) => Effect.Effect<void>
		readonly claimed: Effect.Effect<ReadonlyArray<number>>
	}
>() {
	static readonly Test: Layer.Layer<GpioInputPort | SimulatedGpio> = Layer.effectContext(
		Effect.gen(function* () {
			const lines = yield* Ref.make(HashMap.empty<number, Line>())
			const claims = yield* Ref.make<ReadonlyArray<number>>([])

			const port = GpioInputPort.of({
				claim: (pin) =>
					Effect.acquireRelease(
						Ref.update(claims, (pins) => [...pins, pin]),
						() => Ref.update(claims, (pins) => pins.filter((claimed) => claimed !== pin)),
					),

				read: (pin) =>
					Ref.get(lines).pipe(
						Effect.map(HashMap.get(pin)),
						Effect.flatMap(
							Option.match({
								onNone: () => Effect.succeed<Level>('released'),
								onSome: (line) =>
									line._tag === 'Level'
										? Effect.succeed(line.level)
										: Effect.fail(new GpioError({ message: line.message, operation: 'read', pin })),
							}),
						),
					),
			})

			const controls = SimulatedGpio.of({
				break: (pin, message) => Ref.update(lines, HashMap.set<number, Line>(pin, { _tag: 'Broken', message })),
				claimed: Ref.get(claims),
				set: (pin, level) => Ref.update(lines, HashMap.set<number, Line>(pin, { _tag: 'Level', level })),
			})

			return Context.make(GpioInputPort, port).pipe(Context.add(SimulatedGpio, controls))
		}),
	)
}
