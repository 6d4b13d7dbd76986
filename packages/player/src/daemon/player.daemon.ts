/**
 * Player peer daemon (`plsm`)
 *
 * ```
 * Init --> Authenticating --ready--> Ready <--stop-- Playing
 *              |                      |  --play/tag-->  |
 *              +--failed--> Error <---+-----------------+  (fatal backend failure)
 *                            |
 *                            +--re-authenticated (on backoff)--> Ready
 * ```
 *
 * Tags resolve through the {@link TagStorePort}; the position of the session is saved back every
 * `progressSaveMs` while playing, before switching tags, on stop and on shutdown.
 */

import * as Clock from 'effect/Clock'
import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Match from 'effect/Match'
import * as Option from 'effect/Option'
import * as Ref from 'effect/Ref'

import {
	type Accepted,
	Backoff,
	bounded,
	type CollaboratorError,
	CommandFailed,
	type CommandHandler,
	CommandRejected,
	type CommandSet,
	Daemon,
	DaemonContext,
	type DaemonIdentity,
	EventPublisher,
	type LogThreshold,
	ping,
	setDebug,
} from '@hearo/platform'
import { commandNames, Player } from '@hearo/schemas/messages'

import { PlayerConfig } from '../config/player.config.ts'
import { type Operation, PlayerPeer, type PlayerState } from '../domain/player-peer.domain.ts'
import { PlaybackBackendPort } from '../ports/playback-backend.port.ts'
import { TagStorePort } from '../ports/tag-store.port.ts'

export const PlayerCommands: CommandSet<typeof Player.Commands.Commands.Type, typeof Player.Commands.Commands.Encoded> =
	{
		names: commandNames('Player'),
		schema: Player.Commands.Commands,
	}

export const playerDaemon = Effect.gen(function* () {
	const config = yield* PlayerConfig
	const backend = yield* PlaybackBackendPort
	const tags = yield* TagStorePort
	const publisher = yield* EventPublisher

	const peer = yield* Ref.make(PlayerPeer.initial(config.backoff, yield* Clock.currentTimeMillis))

	const call = <A>(operation: string, effect: Effect.Effect<A, CollaboratorError>) =>
		Effect.either(effect.pipe(bounded(operation, config.callTimeout)))

	const transition = (to: PlayerState) =>
		Effect.gen(function* () {
			const { state: from } = yield* Ref.get(peer)
			if (from === to) return

			yield* Ref.update(peer, (current) => ({
				...current,
				session: to === 'Ready' || to === 'Error' ? Option.none() : current.session,
				state: to,
			}))
			yield* Effect.logInfo('Player state changed', { from, to })
			yield* publisher.publish({ _tag: 'PLSM_EVENT_STATE_CHANGED', from, to })
		})

	/**
	 * Schedules the next authentication attempt; entering `Error` starts the backoff over, failing in it advances it.
	 */
	const enterError = Effect.gen(function* () {
		const nowMs = yield* Clock.currentTimeMillis
		const { backoff, state } = yield* Ref.get(peer)
		const next = state === 'Error' ? backoff : Backoff.make(config.backoff, nowMs)

		yield* transition('Error')
		yield* Ref.update(peer, (current) => ({ ...current, backoff: Backoff.advance(next, nowMs) }))
	})

	/**
	 * Announces a backend failure; fatal ones park the peer in `Error` until it re-authenticates.
	 */
	const fail = (operation: Operation, error: CollaboratorError) =>
		Effect.gen(function* () {
			yield* Effect.logWarning('Playback backend call failed', {
				code: error.code,
				error: error._tag,
				message: error.message,
				operation,
			})

			const { auth, events } = PlayerPeer.failure((yield* Ref.get(peer)).auth, error, operation)
			yield* Ref.update(peer, (current) => ({ ...current, auth, lastErrorCode: error.code }))
			yield* Effect.forEach(events, publisher.publish, { discard: true })

			if (PlayerPeer.isFatal(error)) {
				yield* enterError
			}
		})

	const failed = (operation: Operation, error: CollaboratorError) =>
		fail(operation, error).pipe(
			Effect.zipRight(Effect.fail(new CommandFailed({ code: error.code, message: `${operation} failed: ${error.message}` }))),
		)

	const authenticate = Effect.gen(function* () {
		const ready = yield* call('ensureReady', backend.ensureReady)

		if (Either.isLeft(ready)) {
			yield* fail('startup', ready.left)
			// fatal failures are already in Error
			if (!PlayerPeer.isFatal(ready.left)) yield* enterError
			return
		}

		yield* Ref.update(peer, (current) => ({ ...current, auth: 'Ok' as const }))
		yield* Effect.logInfo('Playback backend authenticated')
		yield* publisher.publish(new Player.Events.Authenticated())
		yield* transition('Ready')
		const nowMs = yield* Clock.currentTimeMillis
		yield* Ref.update(peer, (current) => ({ ...current, backoff: Backoff.reset(current.backoff, nowMs) }))
	})

	/**
	 * Saves where the tag session is now. Sessions of an explicit `PLAY` have no tag and are not saved.
	 */
	const persistProgress = Effect.gen(function* () {
		const { session } = yield* Ref.get(peer)
		if (Option.isNone(session) || session.value.uid === null) return

		const status = yield* call('status', backend.status)
		if (Either.isLeft(status)) {
			return yield* fail('status', status.left)
		}

		const uid = session.value.uid
		const trackUri = status.right.uri ?? session.value.uri
		const positionMs = Math.max(0, Math.round(status.right.positionMs))

		yield* Ref.update(peer, (current) => ({
			...current,
			session: Option.map(current.session, (latest) => ({ ...latest, positionMs })),
		}))

		yield* tags.saveProgress({ positionMs, trackUri, uid }).pipe(
			Effect.tap(() => Effect.logDebug('Progress saved', { positionMs, trackUri, uid })),
			Effect.catchTag('TagStoreError', (error) =>
				Effect.logError('Progress could not be saved', { message: error.message, uid }).pipe(
					Effect.zipRight(Ref.update(peer, (current) => ({ ...current, lastErrorCode: 'SQL_ERROR' }))),
					Effect.zipRight(
						publisher.publish(new Player.Events.PlaybackError({ code: 'SQL_ERROR', message: error.message })),
					),
				),
			),
		)
	})

	const startPlayback = (uid: string | null, uri: string, positionMs: number) =>
		Effect.gen(function* () {
			const played = yield* call('play', backend.play(uri, positionMs))
			if (Either.isLeft(played)) {
				return yield* failed('play', played.left)
			}

			const nowMs = yield* Clock.currentTimeMillis
			yield* Ref.update(peer, (current) => ({
				...current,
				lastSavedAtMs: nowMs,
				session: Option.some({ positionMs, uid, uri }),
			}))
			yield* Effect.logInfo('Playback started', { positionMs, uid, uri })
			yield* publisher.publish(new Player.Events.PlayStarted({ positionMs, uri }))
			yield* transition('Playing')

			return { position_ms: positionMs, uri }
		})

	const stopPlayback = (reason: string) =>
		Effect.gen(function* () {
			if ((yield* Ref.get(peer)).state !== 'Playing') return

			yield* persistProgress
			const stopped = yield* call('stop', backend.stop)
			if (Either.isLeft(stopped)) {
				yield* fail('stop', stopped.left)
			}

			yield* publisher.publish(new Player.Events.PlayStopped({ reason }))
			if ((yield* Ref.get(peer)).state === 'Playing') {
				yield* transition('Ready')
			}
		})

	const requireAuth = Effect.gen(function* () {
		if ((yield* Ref.get(peer)).auth === 'Ok') return

		if ((yield* Ref.get(peer)).auth !== 'Failed') {
			yield* Ref.update(peer, (current) => ({ ...current, auth: 'Failed' as const }))
			yield* publisher.publish(new Player.Events.AuthFailed({ reason: 'auth_not_ok' }))
		}
		return yield* new CommandRejected({ code: 'AUTH_REQUIRED', message: 'Authentication not OK' })
	})

	const requirePlaying = Effect.gen(function* () {
		if ((yield* Ref.get(peer)).state !== 'Playing') {
			return yield* new CommandRejected({ code: 'NO_ACTIVE_PLAYBACK', message: 'No active playback' })
		}
		yield* requireAuth
	})

	const playTag = (uid: string) =>
		Effect.gen(function* () {
			yield* requireAuth

			const record = yield* tags.resolve(uid).pipe(
				Effect.catchTag('TagStoreError', (error) =>
					Effect.logError('Tag lookup failed', { message: error.message, uid }).pipe(
						Effect.zipRight(publisher.publish(new Player.Events.PlaybackError({ code: 'SQL_ERROR', message: error.message }))),
						Effect.zipRight(Effect.fail(new CommandRejected({ code: 'SQL_ERROR', message: 'Tag lookup failed' }))),
					),
				),
			)

			if (Option.isNone(record)) {
				yield* Effect.logInfo('Tag is not mapped', { uid })
				yield* publisher.publish(new Player.Events.TagUnknown({ uid }))
				return yield* new CommandRejected({ code: 'TAG_UNMAPPED', message: 'Tag not in DB' })
			}

			const start = PlayerPeer.resolveStart(record.value)
			yield* publisher.publish(new Player.Events.TagResolved({ positionMs: start.positionMs, uid, uri: start.uri }))

			return Effect.gen(function* () {
				const { session, state } = yield* Ref.get(peer)
				const switching = Option.exists(session, (current) => current.uid !== uid)

				if (state === 'Playing' && switching) {
					yield* persistProgress
				}

				return yield* startPlayback(uid, start.uri, start.positionMs)
			})
		})

	const skip = (operation: 'next' | 'previous', effect: Effect.Effect<void, CollaboratorError>) =>
		requirePlaying.pipe(
			Effect.as(
				Effect.gen(function* () {
					const skipped = yield* call(operation, effect)
					if (Either.isLeft(skipped)) {
						return yield* failed(operation, skipped.left)
					}

					yield* Ref.update(peer, (current) => ({
						...current,
						session: Option.map(current.session, (latest) => ({ ...latest, positionMs: 0 })),
					}))
					return {}
				}),
			),
		)

	const seek = (deltaMs: number) =>
		requirePlaying.pipe(
			Effect.as(
				Effect.gen(function* () {
					const status = yield* call('status', backend.status)
					if (Either.isLeft(status)) {
						return yield* failed('seek', status.left)
					}

					const target = PlayerPeer.seekTarget(status.right.positionMs, deltaMs)
					const sought = yield* call('seekTo', backend.seekTo(target))
					if (Either.isLeft(sought)) {
						return yield* failed('seek', sought.left)
					}

					yield* Ref.update(peer, (current) => ({
						...current,
						session: Option.map(current.session, (latest) => ({ ...latest, positionMs: target })),
					}))
					return { position_ms: target }
				}),
			),
		)

	const play = (uri: string, positionMs: number) =>
		requireAuth.pipe(
			Effect.as(
				stopPlayback('replaced').pipe(Effect.zipRight(startPlayback(null, uri, positionMs))),
			),
		)

	const shutdown: Accepted<DaemonContext> = Effect.gen(function* () {
		if ((yield* Ref.get(peer)).state === 'Playing') {
			yield* persistProgress
		}
		const context = yield* DaemonContext
		yield* context.requestShutdown('shutdown_command')
		return {}
	})

	const status = Effect.gen(function* () {
		const context = yield* DaemonContext
		return PlayerPeer.status(yield* Ref.get(peer), yield* context.uptimeMs)
	})

	const tick = Effect.gen(function* () {
		const nowMs = yield* Clock.currentTimeMillis
		const current = yield* Ref.get(peer)

		if (current.state === 'Playing' && nowMs - current.lastSavedAtMs >= config.progressSaveMs) {
			yield* persistProgress
			yield* Ref.update(peer, (latest) => ({ ...latest, lastSavedAtMs: nowMs }))
		}

		if (current.state === 'Error' && Backoff.isDue(current.backoff, nowMs)) {
			yield* Effect.logInfo('Retrying playback backend authentication')
			yield* authenticate
		}
	})

	const onStart = Effect.gen(function* () {
		yield* transition('Authenticating')
		yield* Ref.update(peer, (current) => ({ ...current, auth: 'Pending' as const }))
		yield* authenticate
	})

	const handle: CommandHandler<typeof Player.Commands.Commands.Type, DaemonIdentity | DaemonContext | LogThreshold> = (
		command,
	) =>
		Match.value(command).pipe(
			Match.tag('PLSM_CMD_PING', () =>
				ping(
					Ref.get(peer).pipe(
						Effect.map((current) => ({ auth: current.auth, last_error_code: current.lastErrorCode, state: current.state })),
					),
				),
			),
			Match.tag('PLSM_CMD_SET_DEBUG', ({ level }) => setDebug(level)),
			Match.tag('PLSM_COMMAND_PLAY_TAG', ({ uid }) => playTag(uid)),
			Match.tag('PLSM_COMMAND_STOP', () => Effect.succeed(stopPlayback('stopped').pipe(Effect.as({})))),
			Match.tag('PLSM_COMMAND_NEXT', () => skip('next', backend.next)),
			Match.tag('PLSM_COMMAND_PREVIOUS', () => skip('previous', backend.previous)),
			Match.tag('PLSM_COMMAND_SEEK', ({ deltaMs }) => seek(deltaMs)),
			Match.tag('PLSM_COMMAND_PLAY', ({ positionMs, uri }) => play(uri, positionMs)),
			Match.tag('PLSM_COMMAND_STATUS', () => Effect.succeed(status)),
			Match.tag('PLSM_COMMAND_SHUTDOWN', () => Effect.succeed(shutdown)),
			Match.exhaustive,
		)

	yield* Daemon.run({
		commands: PlayerCommands,
		handle,
		onStart,
		tick: { interval: config.tickInterval, run: tick },
	})
}).pipe(Effect.withSpan('PlayerDaemon'))
