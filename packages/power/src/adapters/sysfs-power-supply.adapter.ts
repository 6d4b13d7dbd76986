/**
 * Sysfs power supply adapter
 *
 * Reads the battery's `capacity`, `status` and optional `temp` (tenths of °C) under `/sys/class/power_supply`, and
 * the external supply's `online` flag. Without an external supply node, a charging or full battery implies external
 * power.
 */

import * as FileSystem from '@effect/platform/FileSystem'
import * as Path from '@effect/platform/Path'
import type * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'

import { PowerConfig } from '../config/power.config.ts'
import { PowerSupplyError, PowerSupplyPort } from '../ports/power-supply.port.ts'

const parseInteger = (raw: string): Option.Option<number> => {
	const value = Number.parseInt(raw.trim(), 10)
	return Number.isNaN(value) ? Option.none() : Option.some(value)
}

const make: Effect.Effect<
	Context.Tag.Service<PowerSupplyPort>,
	never,
	FileSystem.FileSystem | Path.Path | PowerConfig
> = Effect.gen(function* () {
	const fs = yield* FileSystem.FileSystem
	const path = yield* Path.Path
	const config = yield* PowerConfig

	const attribute = (supply: string, name: string) =>
		fs.readFileString(path.join(config.root, supply, name)).pipe(
			Effect.mapError(
				(error) => new PowerSupplyError({ cause: error, message: `${supply}/${name}: ${error.message}` }),
			),
		)

	const optional = (supply: string, name: string) =>
		fs.exists(path.join(config.root, supply, name)).pipe(
			Effect.orElseSucceed(() => false),
			Effect.flatMap((exists) => (exists ? Effect.map(attribute(supply, name), Option.some) : Effect.succeedNone)),
		)

	return PowerSupplyPort.of({
		read: Effect.gen(function* () {
			const capacity = yield* attribute(config.battery, 'capacity')
			const soc = yield* Option.match(parseInteger(capacity), {
				onNone: () => Effect.fail(new PowerSupplyError({ message: `unreadable capacity ${JSON.stringify(capacity)}` })),
				onSome: Effect.succeed,
			})

			const status = (yield* attribute(config.battery, 'status')).trim()
			const temperature = Option.flatMap(yield* optional(config.battery, 'temp'), parseInteger)
			const online = Option.flatMap(yield* optional(config.external, 'online'), parseInteger)

			return {
				charging: status === 'Charging',
				extPower: Option.match(online, {
					onNone: () => status === 'Charging' || status === 'Full',
					onSome: (flag) => flag === 1,
				}),
				soc,
				temperatureC: Option.getOrNull(Option.map(temperature, (tenths) => tenths / 10)),
			}
		}),
	})
})

export class SysfsPowerSupply {
	static readonly Live: Layer.Layer<PowerSupplyPort, never, FileSystem.FileSystem | Path.Path | PowerConfig> =
		Layer.effect(PowerSupplyPort, make)
}
