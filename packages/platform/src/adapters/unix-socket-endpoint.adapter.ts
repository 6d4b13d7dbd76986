/**
 * Unix socket endpoint adapter
 *
 * Each endpoint is a stream socket at `<socketDir>/<name>.sock`. A sender opens one connection per frame, writes the
 * frame followed by `\n` and closes; the receiver splits incoming data on newlines so several frames per connection
 * are accepted too.
 */

import * as NodeNet from 'node:net'

import * as FileSystem from '@effect/platform/FileSystem'
import * as Path from '@effect/platform/Path'
import type * as Context from 'effect/Context'
import * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Queue from 'effect/Queue'
import * as Runtime from 'effect/Runtime'
import * as Stream from 'effect/Stream'

import type { EndpointName } from '@hearo/schemas/shared'

import { BusConfig } from '../config/bus.config.ts'
import { EndpointPort, TransportError } from '../ports/endpoint.port.ts'

/**
 * Splits buffered socket data into complete frames; returns the frames and the unterminated remainder
 */
export const splitFrames = (buffer: string): readonly [frames: ReadonlyArray<string>, rest: string] => {
	const parts = buffer.split('\n')
	const rest = parts.pop() ?? ''
	return [parts.map((part) => part.trim()).filter((part) => part.length > 0), rest]
}

const make: Effect.Effect<
	Context.Tag.Service<EndpointPort>,
	never,
	BusConfig | FileSystem.FileSystem | Path.Path
> = Effect.gen(function* () {
	const config = yield* BusConfig
	const fs = yield* FileSystem.FileSystem
	const path = yield* Path.Path
	const runtime = yield* Effect.runtime<never>()
	const runFork = Runtime.runFork(runtime)

	const socketPath = (name: EndpointName.Type) => path.join(config.socketDir, `${name}.sock`)

	const bindError = (name: EndpointName.Type, message: string) => (cause: unknown) =>
		new TransportError({ cause, endpoint: name, message, operation: 'bind' })

	/**
	 * A socket file left behind by a previous owner is assumed dead and removed before bind.
	 */
	const reclaim = (name: EndpointName.Type, file: string) =>
		fs.exists(file).pipe(
			Effect.flatMap((exists) =>
				exists
					? fs.remove(file).pipe(Effect.tap(() => Effect.logDebug('Reclaimed stale endpoint', { endpoint: name, file })))
					: Effect.void,
			),
			Effect.mapError(bindError(name, `could not reclaim ${file}`)),
		)

	const listen = (name: EndpointName.Type, file: string, queue: Queue.Enqueue<string>) =>
		Effect.async<NodeNet.Server, TransportError>((resume) => {
			const server = NodeNet.createServer((socket) => {
				let buffer = ''
				socket.setEncoding('utf8')
				socket.on('data', (chunk: Buffer | string) => {
					const [frames, rest] = splitFrames(buffer + chunk.toString())
					buffer = rest
					for (const frame of frames) {
						Queue.unsafeOffer(queue, frame)
					}
				})
				socket.on('end', () => {
					const [frames] = splitFrames(`${buffer}\n`)
					buffer = ''
					for (const frame of frames) {
						Queue.unsafeOffer(queue, frame)
					}
				})
				socket.on('error', (error) => {
					runFork(Effect.logDebug('Inbound connection failed', { endpoint: name, error: error.message }))
					socket.destroy()
				})
			})
			server.once('error', (error) => resume(Effect.fail(bindError(name, `could not listen on ${file}`)(error))))
			server.listen(file, () => resume(Effect.succeed(server)))
		})

	const close = (server: NodeNet.Server) =>
		Effect.async<void>((resume) => {
			server.close(() => resume(Effect.void))
		})

	const bind = (name: EndpointName.Type) =>
		Effect.gen(function* () {
			const file = socketPath(name)

			yield* fs
				.makeDirectory(config.socketDir, { recursive: true })
				.pipe(Effect.mapError(bindError(name, `could not create ${config.socketDir}`)))
			yield* reclaim(name, file)

			const queue = yield* Effect.acquireRelease(Queue.unbounded<string>(), Queue.shutdown)

			yield* Effect.acquireRelease(listen(name, file, queue), (server) =>
				close(server).pipe(
					Effect.zipRight(fs.remove(file)),
					Effect.catchAll((error) =>
						Effect.logDebug('Endpoint file already removed', { endpoint: name, error: error.message }),
					),
					Effect.zipRight(Effect.logDebug('Endpoint released', { endpoint: name })),
				),
			)

			yield* Effect.logInfo('Endpoint bound', { endpoint: name, file })

			return Stream.fromQueue(queue)
		}).pipe(Effect.withSpan('UnixSocketEndpoint.bind', { attributes: { endpoint: name } }))

	const send = (name: EndpointName.Type, frame: string) =>
		Effect.async<void, TransportError>((resume) => {
			const socket = NodeNet.createConnection(socketPath(name))
			socket.once('error', (error) =>
				resume(Effect.fail(new TransportError({ cause: error, endpoint: name, message: error.message, operation: 'send' }))),
			)
			socket.once('connect', () => socket.end(`${frame}\n`))
			socket.once('close', (hadError) => {
				if (!hadError) resume(Effect.void)
			})
			return Effect.sync(() => socket.destroy())
		}).pipe(
			Effect.timeoutFail({
				duration: Duration.millis(config.sendTimeoutMs),
				onTimeout: () =>
					new TransportError({
						endpoint: name,
						message: `send timed out after ${config.sendTimeoutMs}ms`,
						operation: 'send',
					}),
			}),
		)

	return EndpointPort.of({ bind, send })
})

export class UnixSocketEndpoint {
	/**
	 * Endpoints backed by Unix stream sockets under {@link BusConfig.socketDir}
	 */
	static readonly Live: Layer.Layer<EndpointPort, never, BusConfig | FileSystem.FileSystem | Path.Path> = Layer.effect(
		EndpointPort,
		make,
	)
}
