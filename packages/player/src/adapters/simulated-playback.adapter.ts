import * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Ref from 'effect/Ref'

import type { CollaboratorError } from '@hearo/platform'

import { PlaybackBackendPort, type PlaybackStatus } from '../ports/playback-backend.port.ts'

type Operation = 'ensureReady' | 'play' | 'stop' | 'next' | 'previous' | 'seekTo' | 'status'

interface Speaker {
	readonly playback: PlaybackStatus
	/** Failure returned by the next call of each operation */
	readonly failures: Partial<Record<Operation, CollaboratorError>>
	readonly calls: ReadonlyArray<string>
}

/**
 * SimulatedPlayback - Test controls behind a {@link PlaybackBackendPort}
 *
 * A speaker that starts idle and accepts every call. `play` records the uri and position, `stop` pauses, `seekTo`
 * moves the position and `next` / `previous` keep the current uri. Time does not advance the position: tests move it
 * with {@link SimulatedPlayback} `setPosition`.
 */
export class SimulatedPlayback extends Context.Tag('@hearo/player/adapters/SimulatedPlayback')<
	SimulatedPlayback,
	{
		/** Fails the next call of `operation` with `error` */
		readonly failNext: (operation: Operation, error: CollaboratorError) => Effect.Effect<void>
		readonly setPosition: (positionMs: number) => Effect.Effect<void>
		readonly playback: Effect.Effect<PlaybackStatus>
		/** Port calls in order, with their arguments (`play spotify:track:a 0`) */
		readonly calls: Effect.Effect<ReadonlyArray<string>>
	}
>() {
	static readonly Test: Layer.Layer<PlaybackBackendPort | SimulatedPlayback> = Layer.effectContext(
		Effect.gen(function* () {
			const speaker = yield* Ref.make<Speaker>({
				calls: [],
				failures: {},
				playback: { isPlaying: false, positionMs: 0, uri: null },
			})

			const call = <A>(operation: Operation, label: string, effect: (current: Speaker) => [A, PlaybackStatus]) =>
				Ref.modify(speaker, (current): [Effect.Effect<A, CollaboratorError>, Speaker] => {
					const failure = current.failures[operation]
					const calls = [...current.calls, label]
					const failures: Speaker['failures'] = { ...current.failures, [operation]: undefined }

					if (failure !== undefined) {
						return [Effect.fail(failure), { ...current, calls, failures }]
					}

					const [answer, playback] = effect(current)
					return [Effect.succeed(answer), { calls, failures, playback }]
				}).pipe(Effect.flatten)

			const port = PlaybackBackendPort.of({
				ensureReady: call('ensureReady', 'ensureReady', (current) => [undefined, current.playback]),
				next: call('next', 'next', (current) => [undefined, { ...current.playback, isPlaying: true, positionMs: 0 }]),
				play: (uri, positionMs) =>
					call('play', `play ${uri} ${positionMs}`, () => [undefined, { isPlaying: true, positionMs, uri }]),
				previous: call('previous', 'previous', (current) => [
					undefined,
					{ ...current.playback, isPlaying: true, positionMs: 0 },
				]),
				seekTo: (positionMs) =>
					call('seekTo', `seekTo ${positionMs}`, (current) => [undefined, { ...current.playback, positionMs }]),
				status: call('status', 'status', (current) => [current.playback, current.playback]),
				stop: call('stop', 'stop', (current) => [undefined, { ...current.playback, isPlaying: false }]),
			})

			const controls = SimulatedPlayback.of({
				calls: Ref.get(speaker).pipe(Effect.map((current) => current.calls)),
				failNext: (operation, error) =>
					Ref.update(speaker, (current) => ({ ...current, failures: { ...current.failures, [operation]: error } })),
				playback: Ref.get(speaker).pipe(Effect.map((current) => current.playback)),
				setPosition: (positionMs) =>
					Ref.update(speaker, (current) => ({ ...current, playback: { ...current.playback, positionMs } })),
			})

			return Context.make(PlaybackBackendPort, port).pipe(Context.add(SimulatedPlayback, controls))
		}),
	)
}
