/**
 * LED daemon (`ledd`)
 *
 * Draws a frame every frame interval from the current layers and pushes it to the strip when it differs from the
 * last one shown. Layer commands take effect on the next frame. A failing strip is reported once per failure streak,
 * and the strip is darkened on the way out.
 */

import * as Clock from 'effect/Clock'
import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Match from 'effect/Match'
import * as Option from 'effect/Option'
import * as Ref from 'effect/Ref'

import {
	accept,
	type CommandHandler,
	type CommandSet,
	Daemon,
	type DaemonContext,
	DaemonIdentity,
	EventPublisher,
	type LogThreshold,
	ping,
	setDebug,
} from '@hearo/platform'
import { commandNames, Lifecycle, Led as LedMessages } from '@hearo/schemas/messages'

import { LedConfig } from '../config/led.config.ts'
import { Black, type LayerCommand, Led } from '../domain/led.domain.ts'
import { type Color, LedStripPort } from '../ports/led-strip.port.ts'

interface Output {
	readonly shown: Option.Option<Color>
	readonly failing: boolean
}

export const LedCommands: CommandSet<
	typeof LedMessages.Commands.Commands.Type,
	typeof LedMessages.Commands.Commands.Encoded
> = {
	names: commandNames('Led'),
	schema: LedMessages.Commands.Commands,
}

export const ledDaemon = Effect.gen(function* () {
	const config = yield* LedConfig
	const strip = yield* LedStripPort
	const publisher = yield* EventPublisher
	const identity = yield* DaemonIdentity

	const layers = yield* Ref.make(Led.initial(yield* Clock.currentTimeMillis))
	const output = yield* Ref.make<Output>({ failing: false, shown: Option.none() })

	const frame = Effect.gen(function* () {
		const now = yield* Clock.currentTimeMillis
		const rendered = Led.render(yield* Ref.get(layers), now, config.error)
		yield* Ref.set(layers, rendered.layers)

		const current = yield* Ref.get(output)
		if (!current.failing && Option.exists(current.shown, (shown) => Led.sameColor(shown, rendered.color))) return

		const written = yield* Effect.either(strip.show(rendered.color))

		if (Either.isLeft(written)) {
			if (current.failing) return

			yield* Effect.logWarning('LED strip write failed', { message: written.left.message })
			yield* Ref.set(output, { failing: true, shown: Option.none() })
			return yield* publisher.publish({
				_tag: Lifecycle.Events.name.DaemonError[identity.id],
				code: 'STRIP_WRITE_FAILED',
				message: written.left.message,
				recovering: true,
			})
		}

		yield* Ref.set(output, { failing: false, shown: Option.some(rendered.color) })
	})

	yield* Effect.addFinalizer(() =>
		strip.show(Black).pipe(Effect.catchAll((error) => Effect.logWarning('Could not darken the LED strip', error))),
	)

	const change = (command: LayerCommand) =>
		Clock.currentTimeMillis.pipe(
			Effect.flatMap((now) => Ref.update(layers, (current) => Led.apply(current, command, now))),
			Effect.zipRight(Effect.logDebug('LED layers changed', { cmd: command._tag })),
			Effect.zipRight(accept()),
		)

	const diagnostics = Ref.get(layers).pipe(
		Effect.map((current) => ({
			error_active: current.errorActive,
			feedback_active: Option.isSome(current.feedback),
		})),
	)

	const handle: CommandHandler<
		typeof LedMessages.Commands.Commands.Type,
		DaemonIdentity | DaemonContext | LogThreshold
	> = (command) =>
		Match.value(command).pipe(
			Match.tag('LEDD_CMD_PING', 'LED_PING', () => ping(diagnostics)),
			Match.tag('LEDD_CMD_SET_DEBUG', ({ level }) => setDebug(level)),
			Match.tag('LED_SET_STATE', 'LED_SET_FEEDBACK', 'LED_SET_ERROR', 'LED_OFF', change),
			Match.exhaustive,
		)

	yield* Daemon.run({
		commands: LedCommands,
		handle,
		tick: { interval: config.frameInterval, run: frame },
	})
}).pipe(Effect.withSpan('LedDaemon'))
