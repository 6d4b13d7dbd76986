import { describe, expect, it } from '@effect/vitest'
import * as Chunk from 'effect/Chunk'
import * as Effect from 'effect/Effect'
import * as Stream from 'effect/Stream'

import { EndpointName } from '@hearo/schemas/shared'

import { EndpointPort } from '../ports/endpoint.port.ts'
import { InMemoryEndpoint } from './in-memory-endpoint.adapter.ts'

const name = EndpointName.make('plsm')

describe('InMemoryEndpoint', () => {
	it.scoped('delivers frames to the bound endpoint in send order', () =>
		Effect.gen(function* () {
			const port = yield* EndpointPort
			const frames = yield* port.bind(name)

			yield* port.send(name, 'first')
			yield* port.send(name, 'second')

			const received = yield* frames.pipe(Stream.take(2), Stream.runCollect)
			expect(Chunk.toReadonlyArray(received)).toEqual(['first', 'second'])
		}).pipe(Effect.provide(InMemoryEndpoint.Test)),
	)

	it.effect('fails to send to an endpoint nobody bound', () =>
		Effect.gen(function* () {
			const port = yield* EndpointPort

			const error = yield* Effect.flip(port.send(name, 'lost'))

			expect(error._tag).toBe('TransportError')
			expect(error.operation).toBe('send')
			expect(error.endpoint).toBe('plsm')
			expect(error.message).toBe('endpoint is not bound')
		}).pipe(Effect.provide(InMemoryEndpoint.Test)),
	)

	it.effect('releases the endpoint when the binding scope closes', () =>
		Effect.gen(function* () {
			const port = yield* EndpointPort

			yield* Effect.scoped(port.bind(name))
			const error = yield* Effect.flip(port.send(name, 'late'))

			expect(error.message).toBe('endpoint is not bound')
		}).pipe(Effect.provide(InMemoryEndpoint.Test)),
	)

	it.scoped('reclaims a stale binding of the same name', () =>
		Effect.gen(function* () {
			/**
			 * GIVEN an endpoint bound by a previous owner
			 * WHEN the name is bound again
			 * THEN the previous stream ends
			 *   AND new frames reach the new owner
			 */
			const port = yield* EndpointPort
			const stale = yield* port.bind(name)
			const fresh = yield* port.bind(name)

			yield* port.send(name, 'hello')

			const staleFrames = yield* Stream.runCollect(stale)
			const freshFrames = yield* fresh.pipe(Stream.take(1), Stream.runCollect)

			expect(Chunk.toReadonlyArray(staleFrames)).toEqual([])
			expect(Chunk.toReadonlyArray(freshFrames)).toEqual(['hello'])
		}).pipe(Effect.provide(InMemoryEndpoint.Test)),
	)
})
