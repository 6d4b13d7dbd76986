/**
 * Button daemon (`bd`)
 *
 * Samples every configured button each poll period, feeds the debounce machine and publishes classified interactions
 * as `BD_EVENT_BUTTON`. A failed read counts as "released"; the first failure of a streak is reported as a
 * recoverable `BD_EVENT_ERROR`.
 */

import * as Clock from 'effect/Clock'
import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Match from 'effect/Match'
import * as Option from 'effect/Option'
import * as Ref from 'effect/Ref'

import {
	type CommandHandler,
	type CommandSet,
	Daemon,
	DaemonIdentity,
	type DaemonContext,
	EventPublisher,
	FatalInit,
	type LogThreshold,
	ping,
	setDebug,
} from '@hearo/platform'
import { Button, commandNames, Lifecycle } from '@hearo/schemas/messages'

import { ButtonConfig, type ButtonSpec } from '../config/button.config.ts'
import { Debounce, type Interaction, type Tracker } from '../domain/debounce.domain.ts'
import { GpioInputPort } from '../ports/gpio-input.port.ts'

const interactionKind = {
	HoldTick: 'HOLD_TICK',
	LongPress: 'LONG_PRESS',
	ShortPress: 'SHORT_PRESS',
} as const satisfies Record<Interaction['_tag'], Button.Events.InteractionKind.Type>

interface Slot {
	readonly spec: ButtonSpec
	readonly tracker: Tracker
	/** Inside a streak of failed reads */
	readonly failing: boolean
}

interface ButtonDaemonState {
	readonly slots: ReadonlyArray<Slot>
	readonly lastButton: Option.Option<Button.Events.ButtonPressed>
	readonly lastErrorCode: Option.Option<string>
}

export const ButtonCommands: CommandSet<typeof Button.Commands.Commands.Type, typeof Button.Commands.Commands.Encoded> = {
	names: commandNames('Button'),
	schema: Button.Commands.Commands,
}

export const buttonDaemon = Effect.gen(function* () {
	const config = yield* ButtonConfig
	const gpio = yield* GpioInputPort
	const publisher = yield* EventPublisher
	const identity = yield* DaemonIdentity

	const reportError = (code: string, message: string, recovering: boolean) =>
		publisher.publish({ _tag: Lifecycle.Events.name.DaemonError[identity.id], code, message, recovering })

	yield* Effect.forEach(config.buttons, ({ gpio: pin, name }) =>
		gpio.claim(pin).pipe(
			Effect.tapError((error) => reportError('GPIO_INIT_FAILED', error.message, false)),
			Effect.mapError(
				(error) => new FatalInit({ cause: error, message: `${name} on gpio${pin}: ${error.message}`, resource: 'gpio' }),
			),
		),
	)

	const startedAt = yield* Clock.currentTimeMillis
	const state = yield* Ref.make<ButtonDaemonState>({
		lastButton: Option.none(),
		lastErrorCode: Option.none(),
		slots: config.buttons.map((spec) => ({ failing: false, spec, tracker: Debounce.initial(startedAt) })),
	})

	const sample = (slot: Slot, nowMs: number) =>
		Effect.gen(function* () {
			const read = yield* Effect.either(gpio.read(slot.spec.gpio))
			let failing = slot.failing

			if (Either.isLeft(read) && !slot.failing) {
				failing = true
				yield* Effect.logWarning('Button read failed', { button: slot.spec.name, error: read.left.message })
				yield* reportError('GPIO_READ_FAILED', read.left.message, true)
				yield* Ref.update(state, (current) => ({ ...current, lastErrorCode: Option.some('GPIO_READ_FAILED') }))
			} else if (Either.isRight(read) && slot.failing) {
				failing = false
				yield* Effect.logInfo('Button read recovered', { button: slot.spec.name })
			}

			const level = Either.getOrElse(read, () => 'released' as const)
			const step = Debounce.step(slot.tracker, slot.spec.thresholds, { level, nowMs })

			if (Option.isSome(step.interaction)) {
				const { _tag, durationMs, sequence } = step.interaction.value
				const event = new Button.Events.ButtonPressed({
					button: slot.spec.name,
					durationMs,
					interaction: interactionKind[_tag],
					sequence,
				})
				yield* Effect.logInfo('Button interaction', {
					button: event.button,
					durationMs,
					interaction: event.interaction,
					sequence,
				})
				yield* publisher.publish(event)
				yield* Ref.update(state, (current) => ({ ...current, lastButton: Option.some(event) }))
			} else if (slot.tracker.state !== 'Idle' && step.tracker.state === 'Idle') {
				yield* Effect.logDebug('Press discarded as noise', {
					button: slot.spec.name,
					durationMs: step.tracker.lastChangeMs - step.tracker.pressStartMs,
				})
			}

			return { failing, spec: slot.spec, tracker: step.tracker } satisfies Slot
		})

	const tick = Effect.gen(function* () {
		const nowMs = yield* Clock.currentTimeMillis
		const { slots } = yield* Ref.get(state)
		const next = yield* Effect.forEach(slots, (slot) => sample(slot, nowMs))
		yield* Ref.update(state, (current) => ({ ...current, slots: next }))
	})

	const diagnostics = Ref.get(state).pipe(
		Effect.map((current) => ({
			last_button: Option.match(current.lastButton, {
				onNone: () => null,
				onSome: (event) => ({
					button: event.button,
					duration_ms: event.durationMs,
					interaction: event.interaction,
					sequence: event.sequence,
				}),
			}),
			last_error_code: Option.getOrNull(current.lastErrorCode),
		})),
	)

	const handle: CommandHandler<
		typeof Button.Commands.Commands.Type,
		DaemonIdentity | DaemonContext | LogThreshold
	> = (command) =>
		Match.value(command).pipe(
			Match.tag('BD_CMD_PING', () => ping(diagnostics)),
			Match.tag('BD_CMD_SET_DEBUG', ({ level }) => setDebug(level)),
			Match.exhaustive,
		)

	yield* Daemon.run({
		commands: ButtonCommands,
		handle,
		tick: { interval: config.pollInterval, run: tick },
	})
}).pipe(Effect.withSpan('ButtonDaemon'))
