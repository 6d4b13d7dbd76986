/**
 * Daemon - The single cooperative loop every daemon runs
 *
 * ```txt
 * bind command endpoint (and the bus endpoint, for the orchestrator)
 *   -> publish DAEMON_STARTED
 *   -> serially handle: inbound commands | bus events | fixed-period ticks
 *   -> on interruption or requested shutdown: finish the current item,
 *      publish DAEMON_STOPPED, release the endpoints
 * ```
 *
 * Items are handled one at a time and each runs uninterruptibly, so the daemon's state is only touched by one item at
 * a time and a shutdown never cuts a tick in half. A failure inside an item is logged and the loop carries on.
 */

import * as Clock from 'effect/Clock'
import * as Data from 'effect/Data'
import * as Deferred from 'effect/Deferred'
import type * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Ref from 'effect/Ref'
import type * as Scope from 'effect/Scope'
import * as Stream from 'effect/Stream'

import type { Envelope, EventEnvelope } from '@hearo/schemas/envelope'
import { Lifecycle } from '@hearo/schemas/messages'

import { Endpoints } from '../bus/endpoints.ts'
import { Envelopes } from '../bus/envelopes.ts'
import { EventPublisher } from '../bus/event-publisher.ts'
import { MessageBus } from '../bus/message-bus.ts'
import type { EndpointPort, TransportError } from '../ports/endpoint.port.ts'
import { type CommandHandler, type CommandSet, respond } from './command-responder.ts'
import { DaemonContext } from './daemon-context.ts'
import { DaemonIdentity } from './daemon-identity.ts'

export interface DaemonDefinition<C, I extends { readonly _tag: string }, R> {
	readonly commands: CommandSet<C, I>
	readonly handle: CommandHandler<C, R>

	/** Runs once after `DAEMON_STARTED` was published, before the first item */
	readonly onStart?: Effect.Effect<void, never, R>

	/** Fixed-period work; the first tick fires immediately */
	readonly tick?: {
		readonly interval: Duration.DurationInput
		readonly run: Effect.Effect<void, never, R>
	}

	/** When present, the daemon also binds the bus endpoint and receives every published event */
	readonly onBusEvent?: (envelope: EventEnvelope) => Effect.Effect<void, never, R>
}

type Item = Data.TaggedEnum<{
	Inbound: { readonly envelope: Envelope.Type }
	BusEvent: { readonly envelope: Envelope.Type }
	Tick: {}
}>

const Item = Data.taggedEnum<Item>()

export const run = <C, I extends { readonly _tag: string }, R>(
	definition: DaemonDefinition<C, I, R>,
): Effect.Effect<
	void,
	TransportError,
	Exclude<R, DaemonContext> | DaemonIdentity | MessageBus | Envelopes | EventPublisher | Scope.Scope
> =>
	Effect.gen(function* () {
		const identity = yield* DaemonIdentity
		const bus = yield* MessageBus
		const publisher = yield* EventPublisher

		const startedAt = yield* Clock.currentTimeMillis
		const shutdown = yield* Deferred.make<string>()
		const stopReason = yield* Ref.make('shutdown')

		const context = DaemonContext.of({
			requestShutdown: (reason) => Deferred.succeed(shutdown, reason).pipe(Effect.asVoid),
			uptimeMs: Effect.map(Clock.currentTimeMillis, (now) => now - startedAt),
		})

		const commands = yield* bus.listen(Endpoints.command(identity.id))
		const busEvents = definition.onBusEvent ? yield* bus.listen(Endpoints.events) : Stream.empty

		// Runs before the endpoints are released
		yield* Effect.addFinalizer(() =>
			Ref.get(stopReason).pipe(
				Effect.tap((reason) =>
					publisher.publish({ _tag: Lifecycle.Events.name.DaemonStopped[identity.id], pid: identity.pid, reason }),
				),
				Effect.flatMap((reason) => Effect.logInfo('Daemon stopped', { daemon: identity.id, reason })),
			),
		)

		yield* publisher.publish({
			_tag: Lifecycle.Events.name.DaemonStarted[identity.id],
			pid: identity.pid,
			version: identity.version,
		})
		yield* Effect.logInfo('Daemon started', { daemon: identity.id, pid: identity.pid, version: identity.version })

		if (definition.onStart) {
			yield* definition.onStart.pipe(Effect.provideService(DaemonContext, context))
		}

		const ticks = definition.tick ? Stream.tick(definition.tick.interval).pipe(Stream.as(Item.Tick())) : Stream.empty

		const handle = Item.$match({
			BusEvent: ({ envelope }) =>
				envelope.schema === 'event' && definition.onBusEvent
					? definition.onBusEvent(envelope)
					: Effect.logDebug('Ignoring non-event on the bus endpoint', { id: envelope.id, kind: envelope.schema }),
			Inbound: ({ envelope }) =>
				envelope.schema === 'cmd'
					? respond(definition.commands, definition.handle, envelope)
					: Effect.logDebug('Ignoring non-command on the command endpoint', { id: envelope.id, kind: envelope.schema }),
			Tick: () => definition.tick?.run ?? Effect.void,
		})

		const loop = Stream.mergeAll<Item, never, never>(
			[
				Stream.map(commands, (envelope) => Item.Inbound({ envelope })),
				Stream.map(busEvents, (envelope) => Item.BusEvent({ envelope })),
				ticks,
			],
			{ concurrency: 'unbounded' },
		).pipe(
			Stream.runForEach((item) =>
				handle(item).pipe(
					Effect.catchAllCause((cause) => Effect.logError('Daemon item failed', { item: item._tag, cause })),
					Effect.provideService(DaemonContext, context),
					Effect.uninterruptible,
				),
			),
		)

		const requested = Deferred.await(shutdown).pipe(
			Effect.tap((reason) => Ref.set(stopReason, reason)),
			Effect.tap((reason) => Effect.logInfo('Shutdown requested', { reason })),
		)

		yield* Effect.raceFirst(loop, requested)
	}).pipe(Effect.withSpan('Daemon.run'))

/**
 * Bus services for daemon `id`; the transport is provided separately.
 */
export const layer = (
	id: Parameters<typeof DaemonIdentity.layer>[0],
): Layer.Layer<EventPublisher | MessageBus | Envelopes | DaemonIdentity, never, EndpointPort> =>
	EventPublisher.Default.pipe(
		Layer.provideMerge(Layer.mergeAll(MessageBus.Default, Envelopes.Default)),
		Layer.provideMerge(DaemonIdentity.layer(id)),
	)
