import * as Effect from 'effect/Effect'

import { type DomainEvent, encodeDomainEvent } from '@hearo/schemas/messages'

import { Endpoints } from './endpoints.ts'
import { Envelopes } from './envelopes.ts'
import { MessageBus } from './message-bus.ts'

/**
 * EventPublisher - Publishes domain events to the bus endpoint
 *
 * Never fails: events are best effort like every other message.
 */
export class EventPublisher extends Effect.Service<EventPublisher>()('@hearo/platform/bus/EventPublisher', {
	effect: Effect.gen(function* () {
		const bus = yield* MessageBus
		const envelopes = yield* Envelopes

		const publish = (event: DomainEvent.Type): Effect.Effect<void> =>
			encodeDomainEvent(event).pipe(
				Effect.flatMap(envelopes.event),
				Effect.tap((envelope) => Effect.logDebug('Publishing event', { event: envelope.event, id: envelope.id })),
				Effect.flatMap((envelope) => bus.publish(Endpoints.events, envelope)),
				Effect.catchTag('ParseError', (error) =>
					Effect.logError('Event could not be encoded', { error: error.message, event: event._tag }),
				),
			)

		return { publish } as const
	}),
}) {}
