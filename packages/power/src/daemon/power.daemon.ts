/**
 * Power daemon (`powd`)
 *
 * Reads the battery gauge on start and then every report period, publishing `POWD_EVENT_BATTERY_STATE` each time and
 * `POWD_EVENT_BATTERY_CRITICAL` when the battery enters the critical band. A failing gauge is reported once per
 * failure streak.
 */

import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Match from 'effect/Match'
import * as Option from 'effect/Option'
import * as Ref from 'effect/Ref'

import {
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
import { commandNames, Lifecycle, Power as PowerMessages } from '@hearo/schemas/messages'

import { PowerConfig } from '../config/power.config.ts'
import { Power } from '../domain/power.domain.ts'
import { PowerSupplyPort } from '../ports/power-supply.port.ts'

interface PowerState {
	readonly last: Option.Option<PowerMessages.Events.BatteryState>
	readonly failing: boolean
	readonly lastErrorCode: Option.Option<string>
}

export const PowerCommands: CommandSet<
	typeof PowerMessages.Commands.Commands.Type,
	typeof PowerMessages.Commands.Commands.Encoded
> = {
	names: commandNames('Power'),
	schema: PowerMessages.Commands.Commands,
}

export const powerDaemon = Effect.gen(function* () {
	const config = yield* PowerConfig
	const supply = yield* PowerSupplyPort
	const publisher = yield* EventPublisher
	const identity = yield* DaemonIdentity

	const state = yield* Ref.make<PowerState>({ failing: false, last: Option.none(), lastErrorCode: Option.none() })

	const report = Effect.gen(function* () {
		const reading = yield* Effect.either(supply.read)
		const current = yield* Ref.get(state)

		if (Either.isLeft(reading)) {
			if (current.failing) return

			yield* Effect.logWarning('Battery gauge read failed', { message: reading.left.message })
			yield* Ref.set(state, { ...current, failing: true, lastErrorCode: Option.some('GAUGE_READ_FAILED') })
			return yield* publisher.publish({
				_tag: Lifecycle.Events.name.DaemonError[identity.id],
				code: 'GAUGE_READ_FAILED',
				message: reading.left.message,
				recovering: true,
			})
		}

		const assessment = Power.assess(
			Option.map(current.last, (event) => event.band),
			reading.right,
		)

		if (!Option.contains(Option.map(current.last, (event) => event.band), assessment.state.band)) {
			yield* Effect.logInfo('Battery band changed', { band: assessment.state.band, soc: assessment.state.soc })
		}

		yield* Ref.set(state, { ...current, failing: false, last: Option.some(assessment.state) })
		yield* publisher.publish(assessment.state)

		if (Option.isSome(assessment.critical)) {
			yield* Effect.logWarning('Battery critical', { soc: assessment.critical.value.soc })
			yield* publisher.publish(assessment.critical.value)
		}
	})

	const diagnostics = Ref.get(state).pipe(
		Effect.map((current) => ({
			band: Option.getOrNull(Option.map(current.last, (event) => event.band)),
			last_error_code: Option.getOrNull(current.lastErrorCode),
			soc: Option.getOrNull(Option.map(current.last, (event) => event.soc)),
			temp_band: Option.getOrNull(Option.map(current.last, (event) => event.tempBand)),
		})),
	)

	const handle: CommandHandler<
		typeof PowerMessages.Commands.Commands.Type,
		DaemonIdentity | DaemonContext | LogThreshold
	> = (command) =>
		Match.value(command).pipe(
			Match.tag('POWD_CMD_PING', () => ping(diagnostics)),
			Match.tag('POWD_CMD_SET_DEBUG', ({ level }) => setDebug(level)),
			Match.exhaustive,
		)

	yield* Daemon.run({
		commands: PowerCommands,
		handle,
		tick: { interval: config.reportInterval, run: report },
	})
}).pipe(Effect.withSpan('PowerDaemon'))
