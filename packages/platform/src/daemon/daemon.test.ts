import { describe, expect, it } from '@effect/vitest'
import * as Deferred from 'effect/Deferred'
import * as Effect from 'effect/Effect'
import * as Fiber from 'effect/Fiber'
import * as Layer from 'effect/Layer'

import { Button, commandNames } from '@hearo/schemas/messages'

import { Endpoints } from '../bus/endpoints.ts'
import { LogThreshold } from '../logging/logging.ts'
import { nextEvent, probe, ReplyEndpoint, sendCommand, TestBus } from '../testing/bus.fixture.ts'
import type { CommandHandler, CommandSet } from './command-responder.ts'
import { ping, setDebug } from './common-commands.ts'
import * as Daemon from './daemon.ts'
import { DaemonContext } from './daemon-context.ts'
import type { DaemonIdentity } from './daemon-identity.ts'

const ButtonCommands = Button.Commands.Commands

const commands: CommandSet<typeof ButtonCommands.Type, typeof ButtonCommands.Encoded> = {
	names: commandNames('Button'),
	schema: ButtonCommands,
}

const handle: CommandHandler<typeof ButtonCommands.Type, DaemonIdentity | DaemonContext | LogThreshold> = (command) =>
	command._tag === 'BD_CMD_PING' ? ping() : setDebug(command.level)

const TestLayer = Layer.merge(TestBus('bd'), LogThreshold.Default)

describe('Daemon.run', () => {
	it.scoped('announces itself, serves commands and announces its stop', () =>
		Effect.gen(function* () {
			/**
			 * GIVEN a daemon with the common commands
			 * WHEN it starts, receives a ping and is interrupted
			 * THEN DAEMON_STARTED is published first
			 *   AND the ping is acked and answered
			 *   AND DAEMON_STOPPED with reason "shutdown" is published last
			 */
			const events = yield* probe(Endpoints.events)
			const replies = yield* probe(ReplyEndpoint)

			const daemon = yield* Daemon.run({ commands, handle }).pipe(Effect.scoped, Effect.fork)

			const started = yield* nextEvent(events)
			expect(started).toEqual({ _tag: 'BD_EVENT_DAEMON_STARTED', pid: process.pid, version: '0.1.0' })

			const command = yield* sendCommand(Endpoints.command('bd'), { name: 'BD_CMD_PING', payload: {} })
			const ack = yield* replies.next
			const result = yield* replies.next

			expect(ack.schema).toBe('ack')
			expect(result.schema === 'result' && result.correlatesTo).toBe(command.id)
			expect(result.schema === 'result' && result.payload['status']).toBe('ok')

			yield* Fiber.interrupt(daemon)

			const stopped = yield* nextEvent(events)
			expect(stopped).toEqual({ _tag: 'BD_EVENT_DAEMON_STOPPED', pid: process.pid, reason: 'shutdown' })
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('stops after a requested shutdown with its reason', () =>
		Effect.gen(function* () {
			const events = yield* probe(Endpoints.events)

			yield* Daemon.run({
				commands,
				handle,
				tick: {
					interval: '1 second',
					run: DaemonContext.pipe(Effect.flatMap((context) => context.requestShutdown('battery critical'))),
				},
			}).pipe(Effect.scoped)

			const started = yield* nextEvent(events)
			const stopped = yield* nextEvent(events)

			expect(started._tag).toBe('BD_EVENT_DAEMON_STARTED')
			expect(stopped).toEqual({ _tag: 'BD_EVENT_DAEMON_STOPPED', pid: process.pid, reason: 'battery critical' })
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('keeps serving after a failing tick', () =>
		Effect.gen(function* () {
			const events = yield* probe(Endpoints.events)
			const replies = yield* probe(ReplyEndpoint)
			const ticked = yield* Deferred.make<void>()

			const daemon = yield* Daemon.run({
				commands,
				handle,
				tick: {
					interval: '1 second',
					run: Deferred.succeed(ticked, undefined).pipe(Effect.zipRight(Effect.die('sensor exploded'))),
				},
			}).pipe(Effect.scoped, Effect.fork)

			yield* nextEvent(events)
			yield* Deferred.await(ticked)
			yield* sendCommand(Endpoints.command('bd'), { name: 'BD_CMD_PING', payload: {} })
			const ack = yield* replies.next

			expect(ack.schema).toBe('ack')

			yield* Fiber.interrupt(daemon)
		}).pipe(Effect.provide(TestLayer)),
	)
})
