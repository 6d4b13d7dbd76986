/**
 * Sysfs GPIO adapter
 *
 * Uses the legacy `/sys/class/gpio` interface: a pin is exported and set to `in` when claimed, unexported when the
 * scope closes, and read from `gpio<N>/value`. Buttons are wired against pull-ups, so a `0` reads as pressed unless
 * `HEARO_GPIO_ACTIVE_LOW=false`.
 */

import * as FileSystem from '@effect/platform/FileSystem'
import * as Path from '@effect/platform/Path'
import * as Config from 'effect/Config'
import type { ConfigError } from 'effect/ConfigError'
import type * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'

import type { Level } from '../domain/debounce.domain.ts'
import { GpioError, GpioInputPort } from '../ports/gpio-input.port.ts'

/**
 * Maps the raw `value` file content to a logical level.
 */
export const parseLevel = (raw: string, activeLow: boolean): Option.Option<Level> => {
	switch (raw.trim()) {
		case '0':
			return Option.some(activeLow ? 'pressed' : 'released')
		case '1':
			return Option.some(activeLow ? 'released' : 'pressed')
		default:
			return Option.none()
	}
}

const make: Effect.Effect<
	Context.Tag.Service<GpioInputPort>,
	ConfigError,
	FileSystem.FileSystem | Path.Path
> = Effect.gen(function* () {
	const fs = yield* FileSystem.FileSystem
	const path = yield* Path.Path
	const { activeLow, root } = yield* Config.all({
		activeLow: Config.boolean('HEARO_GPIO_ACTIVE_LOW').pipe(Config.withDefault(true)),
		root: Config.string('HEARO_GPIO_ROOT').pipe(Config.withDefault('/sys/class/gpio')),
	})

	const pinDir = (pin: number) => path.join(root, `gpio${pin}`)

	const failWith = (pin: number, operation: 'claim' | 'read') => (cause: unknown) =>
		new GpioError({ cause, message: `gpio${pin} ${operation} failed`, operation, pin })

	const exportPin = (pin: number) =>
		fs.exists(pinDir(pin)).pipe(
			Effect.flatMap((exported) =>
				exported ? Effect.void : fs.writeFileString(path.join(root, 'export'), `${pin}`),
			),
			Effect.zipRight(fs.writeFileString(path.join(pinDir(pin), 'direction'), 'in')),
			Effect.mapError(failWith(pin, 'claim')),
		)

	const unexportPin = (pin: number) =>
		fs.writeFileString(path.join(root, 'unexport'), `${pin}`).pipe(
			Effect.catchAll((error) => Effect.logDebug('GPIO unexport failed', { error: error.message, pin })),
		)

	return GpioInputPort.of({
		claim: (pin) =>
			Effect.acquireRelease(exportPin(pin), () => unexportPin(pin)).pipe(
				Effect.tap(() => Effect.logDebug('GPIO claimed', { activeLow, pin })),
			),

		read: (pin) =>
			fs.readFileString(path.join(pinDir(pin), 'value')).pipe(
				Effect.mapError(failWith(pin, 'read')),
				Effect.flatMap((raw) =>
					Option.match(parseLevel(raw, activeLow), {
						onNone: () =>
							Effect.fail(
								new GpioError({ message: `gpio${pin} reported ${JSON.stringify(raw)}`, operation: 'read', pin }),
							),
						onSome: Effect.succeed,
					}),
				),
			),
	})
})

export class SysfsGpio {
	static readonly Live: Layer.Layer<GpioInputPort, ConfigError, FileSystem.FileSystem | Path.Path> = Layer.effect(
		GpioInputPort,
		make,
	)
}
