import * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as Ref from 'effect/Ref'

import { PowerSupplyError, PowerSupplyPort, type SupplyReading } from '../ports/power-supply.port.ts'

/**
 * SimulatedBattery - Test controls behind a {@link PowerSupplyPort}
 *
 * Starts at 80% on battery, 30 °C.
 */
export class SimulatedBattery extends Context.Tag('@hearo/power/adapters/SimulatedBattery')<
	SimulatedBattery,
	{
		readonly set: (reading: Partial<SupplyReading>) => Effect.Effect<void>
		/** Makes reads fail until the next {@link set} */
		readonly fail: (message: string) => Effect.Effect<void>
	}
>() {
	static readonly Test: Layer.Layer<PowerSupplyPort | SimulatedBattery> = Layer.effectContext(
		Effect.gen(function* () {
			const gauge = yield* Ref.make<SupplyReading>({ charging: false, extPower: false, soc: 80, temperatureC: 30 })
			const failure = yield* Ref.make(Option.none<string>())

			const port = PowerSupplyPort.of({
				read: Ref.get(failure).pipe(
					Effect.flatMap(
						Option.match({
							onNone: () => Ref.get(gauge),
							onSome: (message) => Effect.fail(new PowerSupplyError({ message })),
						}),
					),
				),
			})

			const controls = SimulatedBattery.of({
				fail: (message) => Ref.set(failure, Option.some(message)),
				set: (reading) =>
					Ref.update(gauge, (current) => ({ ...current, ...reading })).pipe(
						Effect.zipRight(Ref.set(failure, Option.none())),
					),
			})

			return Context.make(PowerSupplyPort, port).pipe(Context.add(SimulatedBattery, controls))
		}),
	)
}
