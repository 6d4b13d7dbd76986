import * as FileSystem from '@effect/platform/FileSystem'
import * as Path from '@effect/platform/Path'
import * as NodeContext from '@effect/platform-node/NodeContext'
import { describe, expect, it } from '@effect/vitest'
import * as ConfigProvider from 'effect/ConfigProvider'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import { PowerConfig } from '../config/power.config.ts'
import { PowerSupplyError, PowerSupplyPort } from '../ports/power-supply.port.ts'
import { SysfsPowerSupply } from './sysfs-power-supply.adapter.ts'

/**
 * Writes a fake `/sys/class/power_supply` tree and reads it through the adapter.
 */
const readTree = (files: Record<string, string>) =>
	Effect.gen(function* () {
		const fs = yield* FileSystem.FileSystem
		const path = yield* Path.Path
		const root = yield* fs.makeTempDirectoryScoped()

		for (const [file, content] of Object.entries(files)) {
			yield* fs.makeDirectory(path.dirname(path.join(root, file)), { recursive: true })
			yield* fs.writeFileString(path.join(root, file), content)
		}

		return yield* PowerSupplyPort.pipe(
			Effect.flatMap((supply) => supply.read),
			Effect.provide(SysfsPowerSupply.Live.pipe(Layer.provide(PowerConfig.Default))),
			Effect.withConfigProvider(ConfigProvider.fromMap(new Map([['HEARO_POWER_SUPPLY_ROOT', root]]))),
		)
	}).pipe(Effect.provide(NodeContext.layer))

describe('SysfsPowerSupply', () => {
	it.scoped('reads charge, status, temperature and external power', () =>
		Effect.gen(function* () {
			const reading = yield* readTree({
				'battery/capacity': '57\n',
				'battery/status': 'Discharging\n',
				'battery/temp': '312\n',
				'usb/online': '1\n',
			})

			expect(reading).toEqual({ charging: false, extPower: true, soc: 57, temperatureC: 31.2 })
		}),
	)

	it.scoped('derives external power from the status without an external supply', () =>
		Effect.gen(function* () {
			const reading = yield* readTree({ 'battery/capacity': '100\n', 'battery/status': 'Full\n' })

			expect(reading).toEqual({ charging: false, extPower: true, soc: 100, temperatureC: null })
		}),
	)

	it.scoped('fails on an unreadable capacity', () =>
		Effect.gen(function* () {
			const error = yield* Effect.flip(readTree({ 'battery/capacity': 'n/a\n', 'battery/status': 'Unknown\n' }))

			expect(error).toBeInstanceOf(PowerSupplyError)
		}),
	)
})
