/**
 * Central orchestrator daemon (`hcsm`)
 *
 * Owns the `events` endpoint: every event on the bus is classified by name and folded through
 * {@link Orchestrator.step}, and the resulting directives are carried out in order. Commands go out without a reply
 * endpoint; the orchestrator learns their outcome from the events the peers publish.
 */

import * as Effect from 'effect/Effect'
import * as Match from 'effect/Match'
import * as Ref from 'effect/Ref'

import {
	type CommandHandler,
	type CommandSet,
	Daemon,
	type DaemonContext,
	type DaemonIdentity,
	Endpoints,
	Envelopes,
	EventPublisher,
	type LogThreshold,
	MessageBus,
	ping,
	setDebug,
} from '@hearo/platform'
import type { EventEnvelope } from '@hearo/schemas/envelope'
import { commandNames, Orchestrator as Messages, Player, Wire } from '@hearo/schemas/messages'

import { Directive, Orchestrator } from '../domain/orchestrator.domain.ts'
import { decodeSignal } from '../domain/signal.domain.ts'

export const OrchestratorCommands: CommandSet<
	typeof Messages.Commands.Commands.Type,
	typeof Messages.Commands.Commands.Encoded
> = {
	names: commandNames('Orchestrator'),
	schema: Messages.Commands.Commands,
}

/** Advisory deadline carried by commands the orchestrator sends */
const COMMAND_TIMEOUT_MS = 1000

const encodePlayerCommand = Wire.encode(Player.Commands.Commands)

export const orchestratorDaemon = Effect.gen(function* () {
	const bus = yield* MessageBus
	const envelopes = yield* Envelopes
	const publisher = yield* EventPublisher

	const machine = yield* Ref.make(Orchestrator.initial)

	const perform = Directive.$match({
		Emit: ({ event }) => publisher.publish(event),
		SendCommand: ({ command, to }) =>
			encodePlayerCommand(command).pipe(
				Effect.flatMap((message) => envelopes.command(message, { timeoutMs: COMMAND_TIMEOUT_MS })),
				Effect.tap((envelope) => Effect.logDebug('Sending command', { cmd: envelope.cmd, id: envelope.id, to })),
				Effect.flatMap((envelope) => bus.publish(Endpoints.command(to), envelope)),
				Effect.catchTag('ParseError', (error) =>
					Effect.logError('Command could not be encoded', { cmd: command._tag, error: error.message }),
				),
			),
	})

	const onBusEvent = (envelope: EventEnvelope) =>
		decodeSignal({ name: envelope.event, payload: envelope.payload }).pipe(
			Effect.flatMap((event) =>
				Ref.modify(machine, (current) => {
					const { directives, orchestrator } = Orchestrator.step(current, event)
					return [{ directives, from: current.state, to: orchestrator.state }, orchestrator] as const
				}),
			),
			Effect.tap(({ from, to }) =>
				from === to ? Effect.void : Effect.logInfo('System state changed', { event: envelope.event, from, to }),
			),
			Effect.flatMap(({ directives }) => Effect.forEach(directives, perform, { discard: true })),
			Effect.catchTag('ParseError', () =>
				Effect.logDebug('Ignoring event the orchestrator does not react to', { event: envelope.event, id: envelope.id }),
			),
		)

	const diagnostics = Ref.get(machine).pipe(
		Effect.map((current) => ({
			initiated: current.initiated,
			link_connected: current.linkConnected,
			started: [...current.started],
			state: current.state,
		})),
	)

	const handle: CommandHandler<
		typeof Messages.Commands.Commands.Type,
		DaemonIdentity | DaemonContext | LogThreshold
	> = (command) =>
		Match.value(command).pipe(
			Match.tag('HCSM_CMD_PING', () => ping(diagnostics)),
			Match.tag('HCSM_CMD_SET_DEBUG', ({ level }) => setDebug(level)),
			Match.exhaustive,
		)

	yield* Daemon.run({ commands: OrchestratorCommands, handle, onBusEvent })
}).pipe(Effect.withSpan('OrchestratorDaemon'))
