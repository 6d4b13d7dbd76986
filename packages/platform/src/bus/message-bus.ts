/**
 * MessageBus - Envelope level access to endpoints
 *
 * `publish` is fire-and-forget: a frame that cannot be delivered is logged as lost and the caller carries on.
 * `listen` yields decoded envelopes only; frames that are not valid envelopes are dropped with a warning.
 */

import * as Effect from 'effect/Effect'
import { identity, pipe } from 'effect/Function'
import * as Option from 'effect/Option'
import * as Stream from 'effect/Stream'

import { decodeEnvelopeJson, type Envelope, encodeEnvelopeJson } from '@hearo/schemas/envelope'
import type { EndpointName } from '@hearo/schemas/shared'

import { ProtocolError } from '../errors.ts'
import { EndpointPort } from '../ports/endpoint.port.ts'

export class MessageBus extends Effect.Service<MessageBus>()('@hearo/platform/bus/MessageBus', {
	effect: Effect.gen(function* () {
		const endpoints = yield* EndpointPort

		const publish = (to: EndpointName.Type, envelope: Envelope.Type): Effect.Effect<void> =>
			pipe(
				encodeEnvelopeJson(envelope),
				Effect.flatMap((frame) => endpoints.send(to, frame)),
				Effect.catchTags({
					ParseError: (error) =>
						Effect.logError('Envelope could not be encoded', { endpoint: to, error: error.message, id: envelope.id }),
					TransportError: (error) =>
						Effect.logWarning('Message lost', {
							endpoint: to,
							error: error.message,
							id: envelope.id,
							kind: envelope.schema,
						}),
				}),
				Effect.withSpan('MessageBus.publish', { attributes: { endpoint: to, id: envelope.id } }),
			)

		const decodeFrame = (from: EndpointName.Type) => (frame: string) =>
			decodeEnvelopeJson(frame).pipe(
				Effect.map(Option.some),
				Effect.catchTag('ParseError', (error) => {
					const dropped = new ProtocolError({ endpoint: from, message: error.message })
					return Effect.logWarning('Dropped malformed frame', {
						endpoint: dropped.endpoint,
						error: dropped.message,
					}).pipe(Effect.as(Option.none<Envelope.Type>()))
				}),
			)

		const listen = (name: EndpointName.Type) =>
			endpoints
				.bind(name)
				.pipe(Effect.map((frames) => frames.pipe(Stream.mapEffect(decodeFrame(name)), Stream.filterMap(identity))))

		return { listen, publish } as const
	}),
}) {}
