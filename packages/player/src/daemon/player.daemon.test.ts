import { describe, expect, it } from '@effect/vitest'
import * as Sql from '@effect/sql'
import type * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as TestClock from 'effect/TestClock'

import { AuthIssue, Endpoints, LogThreshold, PeerUnavailable } from '@hearo/platform'
import { nextEvent, probe, ReplyEndpoint, sendCommand, TestBus } from '@hearo/platform/testing'
import type { Envelope } from '@hearo/schemas/envelope'

import { SimulatedPlayback } from '../adapters/simulated-playback.adapter.ts'
import { SqliteTagStore } from '../adapters/sqlite-tag-store.adapter.ts'
import { PlayerConfig } from '../config/player.config.ts'
import { TagStorePort } from '../ports/tag-store.port.ts'
import { playerDaemon } from './player.daemon.ts'

const TestLayer = Layer.mergeAll(
	TestBus('plsm'),
	LogThreshold.Default,
	SimulatedPlayback.Test,
	SqliteTagStore.Test,
	PlayerConfig.Default,
)

const morning = 'spotify:playlist:morning'

const assign = (uid: string, playlistUri: string, last: { readonly trackUri: string; readonly posMs: number }) =>
	Effect.gen(function* () {
		const sql = yield* Sql.SqlClient.SqlClient
		yield* sql`
        INSERT INTO tags (uid, playlist_uri, last_track_uri, last_pos_ms)
        VALUES (${uid}, ${playlistUri}, ${last.trackUri}, ${last.posMs});
		`
	})

const expectAck = (envelope: Envelope.Type) => {
	if (envelope.schema !== 'ack') {
		throw new Error(`expected an ack, got ${envelope.schema}`)
	}
	return envelope
}

const expectResult = (envelope: Envelope.Type) => {
	if (envelope.schema !== 'result') {
		throw new Error(`expected a result, got ${envelope.schema}`)
	}
	return envelope
}

/**
 * Starts the daemon once `arrange` has set up the speaker and waits for DAEMON_STARTED and the move to
 * Authenticating.
 */
const start = <E = never, R = never>(
	arrange: (speaker: Context.Tag.Service<SimulatedPlayback>) => Effect.Effect<void, E, R> = () => Effect.void,
) =>
	Effect.gen(function* () {
		const events = yield* probe(Endpoints.events)
		const replies = yield* probe(ReplyEndpoint)
		const speaker = yield* SimulatedPlayback

		yield* arrange(speaker)
		yield* playerDaemon.pipe(Effect.scoped, Effect.fork)

		expect((yield* nextEvent(events))._tag).toBe('PLSM_EVENT_DAEMON_STARTED')
		expect(yield* nextEvent(events)).toEqual({ _tag: 'PLSM_EVENT_STATE_CHANGED', from: 'Init', to: 'Authenticating' })

		const send = (name: string, payload: Record<string, unknown> = {}) =>
			sendCommand(Endpoints.command('plsm'), { name, payload })

		return { events, replies, send, speaker } as const
	})

/**
 * Starts the daemon and waits until it is Ready.
 */
const ready = Effect.gen(function* () {
	const daemon = yield* start()

	expect((yield* nextEvent(daemon.events))._tag).toBe('PLSM_EVENT_AUTHENTICATED')
	expect(yield* nextEvent(daemon.events)).toEqual({
		_tag: 'PLSM_EVENT_STATE_CHANGED',
		from: 'Authenticating',
		to: 'Ready',
	})

	return daemon
})

/**
 * Plays tag `04AA` (the morning playlist from its start) and drains its events and replies.
 */
const playing = Effect.gen(function* () {
	const daemon = yield* ready
	yield* assign('04AA', morning, { posMs: 0, trackUri: '' })

	yield* daemon.send('PLSM_COMMAND_PLAY_TAG', { uid: '04AA' })
	// TAG_RESOLVED, PLAY_STARTED, STATE_CHANGED(Playing)
	for (let skipped = 0; skipped < 3; skipped++) {
		yield* nextEvent(daemon.events)
	}
	yield* daemon.replies.next
	yield* daemon.replies.next

	return daemon
})

describe('playerDaemon', () => {
	it.scoped('authenticates on startup', () =>
		Effect.gen(function* () {
			const { speaker } = yield* ready

			expect(yield* speaker.calls).toEqual(['ensureReady'])
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('resumes a tag at its last track and position', () =>
		Effect.gen(function* () {
			/**
			 * GIVEN tag 04AA was last stopped 42s into `spotify:track:two`
			 * WHEN PLAY_TAG 04AA arrives
			 * THEN TAG_RESOLVED and PLAY_STARTED name the track and position, and the player is Playing
			 */
			const { events, replies, send, speaker } = yield* ready
			yield* assign('04AA', morning, { posMs: 42000, trackUri: 'spotify:track:two' })

			yield* send('PLSM_COMMAND_PLAY_TAG', { uid: '04AA' })

			expect(yield* nextEvent(events)).toMatchObject({
				_tag: 'PLSM_EVENT_TAG_RESOLVED',
				positionMs: 42000,
				uid: '04AA',
				uri: 'spotify:track:two',
			})
			expect(yield* nextEvent(events)).toMatchObject({
				_tag: 'PLSM_EVENT_PLAY_STARTED',
				positionMs: 42000,
				uri: 'spotify:track:two',
			})
			expect(yield* nextEvent(events)).toEqual({ _tag: 'PLSM_EVENT_STATE_CHANGED', from: 'Ready', to: 'Playing' })

			expect(expectAck(yield* replies.next).ok).toBe(true)
			expect(expectResult(yield* replies.next).payload).toEqual({ position_ms: 42000, uri: 'spotify:track:two' })
			expect(yield* speaker.calls).toEqual(['ensureReady', 'play spotify:track:two 42000'])
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('rejects an unmapped tag with TAG_UNMAPPED', () =>
		Effect.gen(function* () {
			const { events, replies, send } = yield* ready

			yield* send('PLSM_COMMAND_PLAY_TAG', { uid: 'DEADBEEF' })

			expect(yield* nextEvent(events)).toMatchObject({ _tag: 'PLSM_EVENT_TAG_UNKNOWN', uid: 'DEADBEEF' })
			const ack = expectAck(yield* replies.next)
			expect(ack.ok).toBe(false)
			expect(Option.map(ack.error, (error) => error.code)).toEqual(Option.some('TAG_UNMAPPED'))
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('saves the position every two seconds while playing', () =>
		Effect.gen(function* () {
			const { replies, send, speaker } = yield* playing
			const store = yield* TagStorePort

			yield* speaker.setPosition(3000)
			yield* TestClock.adjust('2 seconds')
			yield* send('PLSM_COMMAND_STATUS')
			yield* replies.next

			expect(expectResult(yield* replies.next).payload).toMatchObject({
				session: { position_ms: 3000, uid: '04AA', uri: morning },
				state: 'Playing',
			})
			expect(Option.getOrThrow(yield* store.resolve('04AA'))).toMatchObject({ lastPosMs: 3000, lastTrackUri: morning })
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('saves the position and returns to Ready on STOP', () =>
		Effect.gen(function* () {
			const { events, replies, send, speaker } = yield* playing
			const store = yield* TagStorePort

			yield* speaker.setPosition(61000)
			yield* send('PLSM_COMMAND_STOP')

			expect(yield* nextEvent(events)).toMatchObject({ _tag: 'PLSM_EVENT_PLAY_STOPPED', reason: 'stopped' })
			expect(yield* nextEvent(events)).toEqual({ _tag: 'PLSM_EVENT_STATE_CHANGED', from: 'Playing', to: 'Ready' })
			expect(expectAck(yield* replies.next).ok).toBe(true)
			expect(expectResult(yield* replies.next).ok).toBe(true)
			expect(Option.getOrThrow(yield* store.resolve('04AA'))).toMatchObject({ lastPosMs: 61000 })
			expect((yield* speaker.playback).isPlaying).toBe(false)
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('seeks relative to the current position, never before the start', () =>
		Effect.gen(function* () {
			const { replies, send, speaker } = yield* playing

			yield* speaker.setPosition(10000)
			yield* send('PLSM_COMMAND_SEEK', { delta_ms: -15000 })

			expect(expectAck(yield* replies.next).ok).toBe(true)
			expect(expectResult(yield* replies.next).payload).toEqual({ position_ms: 0 })
			expect((yield* speaker.calls).at(-1)).toBe('seekTo 0')
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('rejects NEXT without active playback', () =>
		Effect.gen(function* () {
			const { replies, send } = yield* ready

			yield* send('PLSM_COMMAND_NEXT')

			const ack = expectAck(yield* replies.next)
			expect(ack.ok).toBe(false)
			expect(Option.map(ack.error, (error) => error.code)).toEqual(Option.some('NO_ACTIVE_PLAYBACK'))
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('falls into Error when the speaker disappears', () =>
		Effect.gen(function* () {
			/**
			 * GIVEN a playing tag
			 * WHEN NEXT fails because the device is gone
			 * THEN DISCONNECTED, AUTH_LOST and PLAYBACK_ERROR are published, the player moves to Error and the
			 * command result carries the backend code
			 */
			const { events, replies, send, speaker } = yield* playing

			yield* speaker.failNext(
				'next',
				new PeerUnavailable({ code: 'NO_DEVICE', kind: 'resource-unavailable', message: 'speaker not found' }),
			)
			yield* send('PLSM_COMMAND_NEXT')

			expect(yield* nextEvent(events)).toMatchObject({
				_tag: 'PLSM_EVENT_DISCONNECTED',
				reason: 'device_issue:NO_DEVICE',
			})
			expect(yield* nextEvent(events)).toMatchObject({ _tag: 'PLSM_EVENT_AUTH_LOST', reason: 'device_issue:NO_DEVICE' })
			expect(yield* nextEvent(events)).toMatchObject({
				_tag: 'PLSM_EVENT_PLAYBACK_ERROR',
				code: 'NO_DEVICE',
				message: 'speaker not found',
			})
			expect(yield* nextEvent(events)).toEqual({ _tag: 'PLSM_EVENT_STATE_CHANGED', from: 'Playing', to: 'Error' })

			expect(expectAck(yield* replies.next).ok).toBe(true)
			const result = expectResult(yield* replies.next)
			expect(result.ok).toBe(false)
			expect(Option.map(result.error, (error) => error.code)).toEqual(Option.some('NO_DEVICE'))
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('re-authenticates after a rejected startup once the backoff is due', () =>
		Effect.gen(function* () {
			const { events, replies, send } = yield* start((speaker) =>
				speaker.failNext('ensureReady', new AuthIssue({ code: 'invalid_grant', message: 'refresh token revoked' })),
			)

			expect(yield* nextEvent(events)).toMatchObject({
				_tag: 'PLSM_EVENT_AUTH_FAILED',
				reason: 'startup_auth_failed:invalid_grant',
			})
			expect(yield* nextEvent(events)).toEqual({
				_tag: 'PLSM_EVENT_STATE_CHANGED',
				from: 'Authenticating',
				to: 'Error',
			})

			yield* send('PLSM_COMMAND_PLAY', { uri: morning })
			const ack = expectAck(yield* replies.next)
			expect(Option.map(ack.error, (error) => error.code)).toEqual(Option.some('AUTH_REQUIRED'))

			yield* TestClock.adjust('5 seconds')

			expect((yield* nextEvent(events))._tag).toBe('PLSM_EVENT_AUTHENTICATED')
			expect(yield* nextEvent(events)).toEqual({ _tag: 'PLSM_EVENT_STATE_CHANGED', from: 'Error', to: 'Ready' })
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('saves the position and stops on SHUTDOWN', () =>
		Effect.gen(function* () {
			const { events, replies, send, speaker } = yield* playing
			const store = yield* TagStorePort

			yield* speaker.setPosition(5000)
			yield* send('PLSM_COMMAND_SHUTDOWN')

			expect(expectAck(yield* replies.next).ok).toBe(true)
			expect(expectResult(yield* replies.next).ok).toBe(true)
			expect(yield* nextEvent(events)).toMatchObject({
				_tag: 'PLSM_EVENT_DAEMON_STOPPED',
				reason: 'shutdown_command',
			})
			expect(Option.getOrThrow(yield* store.resolve('04AA'))).toMatchObject({ lastPosMs: 5000 })
		}).pipe(Effect.provide(TestLayer)),
	)
})
