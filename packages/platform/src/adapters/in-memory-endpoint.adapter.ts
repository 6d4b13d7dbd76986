import type * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as HashMap from 'effect/HashMap'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as Queue from 'effect/Queue'
import * as Ref from 'effect/Ref'
import * as Stream from 'effect/Stream'

import type { EndpointName } from '@hearo/schemas/shared'

import { EndpointPort, TransportError } from '../ports/endpoint.port.ts'

const make: Effect.Effect<Context.Tag.Service<EndpointPort>> = Effect.gen(function* () {
	const bindings = yield* Ref.make(HashMap.empty<EndpointName.Type, Queue.Queue<string>>())

	const acquire = (name: EndpointName.Type) =>
		Effect.gen(function* () {
			const queue = yield* Queue.unbounded<string>()
			const previous = yield* Ref.modify(bindings, (map) => [HashMap.get(map, name), HashMap.set(map, name, queue)])

			if (Option.isSome(previous)) {
				yield* Queue.shutdown(previous.value)
				yield* Effect.logDebug('Reclaimed stale endpoint', { endpoint: name })
			}

			return queue
		})

	/**
	 * Only the current owner unregisters the name; a binding that was already reclaimed leaves the new one in place.
	 */
	const release = (name: EndpointName.Type, queue: Queue.Queue<string>) =>
		Ref.update(bindings, (map) =>
			Option.exists(HashMap.get(map, name), (current) => current === queue) ? HashMap.remove(map, name) : map,
		).pipe(Effect.zipRight(Queue.shutdown(queue)))

	return EndpointPort.of({
		bind: (name) =>
			Effect.acquireRelease(acquire(name), (queue) => release(name, queue)).pipe(Effect.map(Stream.fromQueue)),

		send: (name, frame) =>
			Ref.get(bindings).pipe(
				Effect.map(HashMap.get(name)),
				Effect.flatMap(
					Option.match({
						onNone: () =>
							Effect.fail(new TransportError({ endpoint: name, message: 'endpoint is not bound', operation: 'send' })),
						onSome: (queue) => Queue.offer(queue, frame),
					}),
				),
				Effect.asVoid,
			),
	})
})

export class InMemoryEndpoint {
	/**
	 * In-process endpoints for tests
	 *
	 * Every provide of the layer builds an isolated set of endpoints. Sending to a name nobody bound fails the same way
	 * a refused socket connection does.
	 */
	static readonly Test: Layer.Layer<EndpointPort> = Layer.effect(EndpointPort, make)
}
