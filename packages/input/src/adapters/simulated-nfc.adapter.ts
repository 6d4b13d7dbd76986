import * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as Ref from 'effect/Ref'

import { NfcReaderError, NfcReaderPort, type TagReading } from '../ports/nfc-reader.port.ts'

interface Field {
	readonly tag: Option.Option<TagReading>
	readonly failure: Option.Option<NfcReaderError>
	readonly initializations: number
	readonly hardwarePresent: boolean
}

/**
 * SimulatedNfc - Test controls behind an {@link NfcReaderPort}
 */
export class SimulatedNfc extends Context.Tag('@hearo/input/adapters/SimulatedNfc')<
	SimulatedNfc,
	{
		readonly place: (uid: string) => Effect.Effect<void>
		readonly remove: Effect.Effect<void>
		/** Makes reads fail with `I2C_TIMEOUT` until the next {@link place} or {@link remove} */
		readonly jam: Effect.Effect<void>
		/** Makes initialisation fail with `HW_NOT_FOUND` */
		readonly unplug: Effect.Effect<void>
		readonly initializations: Effect.Effect<number>
	}
>() {
	static readonly Test: Layer.Layer<NfcReaderPort | SimulatedNfc> = Layer.effectContext(
		Effect.gen(function* () {
			const field = yield* Ref.make<Field>({
				failure: Option.none(),
				hardwarePresent: true,
				initializations: 0,
				tag: Option.none(),
			})

			const port = NfcReaderPort.of({
				initialize: Ref.get(field).pipe(
					Effect.flatMap((current) =>
						current.hardwarePresent
							? Ref.set(field, { ...current, initializations: current.initializations + 1 })
							: Effect.fail(new NfcReaderError({ code: 'HW_NOT_FOUND', message: 'no PN532 on the bus' })),
					),
				),

				read: Ref.get(field).pipe(
					Effect.flatMap((current) =>
						Option.match(current.failure, {
							onNone: () => Effect.succeed(current.tag),
							onSome: Effect.fail,
						}),
					),
				),
			})

			const controls = SimulatedNfc.of({
				initializations: Ref.get(field).pipe(Effect.map((current) => current.initializations)),
				jam: Ref.update(field, (current) => ({
					...current,
					failure: Option.some(new NfcReaderError({ code: 'I2C_TIMEOUT', message: 'read timed out' })),
				})),
				place: (uid) =>
					Ref.update(field, (current) => ({
						...current,
						failure: Option.none(),
						tag: Option.some({ ats: null, tech: 'ISO14443', uid }),
					})),
				remove: Ref.update(field, (current) => ({ ...current, failure: Option.none(), tag: Option.none() })),
				unplug: Ref.update(field, (current) => ({ ...current, hardwarePresent: false })),
			})

			return Context.make(NfcReaderPort, port).pipe(Context.add(SimulatedNfc, controls))
		}),
	)
}
