/**
 * NFC daemon (`nfcd`)
 *
 * Polls the reader and treats "a tag is in the field" as a debounced input:
 *
 * - stable presence → `NFC_EVENT_TAG_ADDED`
 * - hold tick → `NFC_EVENT_TAG_PRESENT` heartbeat
 * - stable absence → `NFC_EVENT_TAG_REMOVED{reason: timeout}`
 * - a different uid while one is tracked → `NFC_EVENT_TAG_REMOVED{reason: replaced}`, then the new tag is debounced
 *
 * Reader failures move the daemon to `error`; it re-initialises the reader every `recoverMs` and on `NFC_CMD_RESTART`.
 */

import * as Clock from 'effect/Clock'
import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Match from 'effect/Match'
import * as Option from 'effect/Option'
import * as Ref from 'effect/Ref'

import {
	accept,
	type CommandHandler,
	type CommandSet,
	Daemon,
	type DaemonContext,
	DaemonIdentity,
	EventPublisher,
	type LogThreshold,
	ping,
	setDebug,
} from '@hearo/platform'
import { commandNames, Lifecycle, Nfc } from '@hearo/schemas/messages'

import { NfcConfig } from '../config/nfc.config.ts'
import { Debounce, type Tracker } from '../domain/debounce.domain.ts'
import { NfcReaderPort, type TagReading } from '../ports/nfc-reader.port.ts'

export type NfcStatus = 'init' | 'ready' | 'error'

interface NfcState {
	readonly status: NfcStatus
	readonly tracker: Tracker
	/** Tag being debounced, or confirmed once the tracker holds */
	readonly candidate: Option.Option<TagReading>
	readonly lastErrorCode: Option.Option<string>
	readonly restartRequested: boolean
	readonly nextRecoveryAtMs: number
}

export const NfcCommands: CommandSet<typeof Nfc.Commands.Commands.Type, typeof Nfc.Commands.Commands.Encoded> = {
	names: commandNames('Nfc'),
	schema: Nfc.Commands.Commands,
}

export const nfcDaemon = Effect.gen(function* () {
	const config = yield* NfcConfig
	const reader = yield* NfcReaderPort
	const publisher = yield* EventPublisher
	const identity = yield* DaemonIdentity

	const startedAt = yield* Clock.currentTimeMillis
	const state = yield* Ref.make<NfcState>({
		candidate: Option.none(),
		lastErrorCode: Option.none(),
		nextRecoveryAtMs: startedAt,
		restartRequested: false,
		status: 'init',
		tracker: Debounce.initial(startedAt),
	})

	const fail = (code: string, message: string, nowMs: number) =>
		Effect.gen(function* () {
			yield* Effect.logWarning('NFC reader failed', { code, message })
			yield* Ref.update(state, (current) => ({
				...current,
				lastErrorCode: Option.some(code),
				nextRecoveryAtMs: nowMs + config.recoverMs,
				status: 'error' as const,
			}))
			yield* publisher.publish({ _tag: Lifecycle.Events.name.DaemonError[identity.id], code, message, recovering: true })
		})

	const initialize = Effect.gen(function* () {
		const nowMs = yield* Clock.currentTimeMillis
		const outcome = yield* Effect.either(reader.initialize)

		if (Either.isLeft(outcome)) {
			return yield* fail(outcome.left.code, outcome.left.message, nowMs)
		}

		yield* Ref.update(state, (current) => ({
			...current,
			candidate: Option.none(),
			restartRequested: false,
			status: 'ready' as const,
			tracker: Debounce.initial(nowMs),
		}))
		yield* Effect.logInfo('NFC reader ready')
		yield* publisher.publish(new Nfc.Events.NfcReady())
	})

	const observe = (reading: Option.Option<TagReading>, nowMs: number) =>
		Effect.gen(function* () {
			let current = yield* Ref.get(state)

			const switched = Option.isSome(reading) && !Option.contains(
				Option.map(current.candidate, (tag) => tag.uid),
				reading.value.uid,
			)

			if (switched) {
				if (Debounce.isHeld(current.tracker) && Option.isSome(current.candidate)) {
					const uid = current.candidate.value.uid
					yield* Effect.logInfo('Tag replaced', { next: reading.value.uid, uid })
					yield* publisher.publish(new Nfc.Events.TagRemoved({ reason: 'replaced', uid }))
				}
				current = { ...current, candidate: reading, tracker: Debounce.initial(nowMs) }
			}

			const step = Debounce.step(current.tracker, config.thresholds, {
				level: Option.isSome(reading) ? 'pressed' : 'released',
				nowMs,
			})

			const added = !Debounce.isHeld(current.tracker) && Debounce.isHeld(step.tracker)
			let candidate = current.candidate

			if (added && Option.isSome(candidate)) {
				const { ats, tech, uid } = candidate.value
				yield* Effect.logInfo('Tag added', { uid })
				yield* publisher.publish(new Nfc.Events.TagAdded({ ats, tech, uid }))
			}

			if (Option.isSome(step.interaction) && Option.isSome(candidate)) {
				const uid = candidate.value.uid
				if (step.interaction.value._tag === 'HoldTick') {
					yield* publisher.publish(new Nfc.Events.TagPresent({ uid }))
				} else {
					yield* Effect.logInfo('Tag removed', { heldMs: step.interaction.value.durationMs, uid })
					yield* publisher.publish(new Nfc.Events.TagRemoved({ reason: 'timeout', uid }))
					candidate = Option.none()
				}
			}

			yield* Ref.set(state, { ...current, candidate, tracker: step.tracker })
		})

	const tick = Effect.gen(function* () {
		const nowMs = yield* Clock.currentTimeMillis
		const current = yield* Ref.get(state)

		if (current.restartRequested) {
			yield* Effect.logInfo('Restarting NFC reader')
			return yield* initialize
		}

		switch (current.status) {
			case 'init':
				return
			case 'error':
				if (nowMs >= current.nextRecoveryAtMs) {
					yield* Effect.logInfo('Attempting NFC reader recovery')
					yield* initialize
				}
				return
			case 'ready': {
				const read = yield* Effect.either(reader.read)
				return Either.isLeft(read)
					? yield* fail(read.left.code, read.left.message, nowMs)
					: yield* observe(read.right, nowMs)
			}
		}
	})

	const diagnostics = Ref.get(state).pipe(
		Effect.map((current) => ({
			current_uid: Debounce.isHeld(current.tracker)
				? Option.getOrNull(Option.map(current.candidate, (tag) => tag.uid))
				: null,
			last_error_code: Option.getOrNull(current.lastErrorCode),
			poll_interval_ms: config.pollIntervalMs,
			state: current.status,
			tag_heartbeat_period_ms: config.thresholds.holdTickIntervalMs,
		})),
	)

	const handle: CommandHandler<typeof Nfc.Commands.Commands.Type, DaemonIdentity | DaemonContext | LogThreshold> = (
		command,
	) =>
		Match.value(command).pipe(
			Match.tag('NFC_CMD_PING', () => ping(diagnostics)),
			Match.tag('NFC_CMD_SET_DEBUG', ({ level }) => setDebug(level)),
			Match.tag('NFC_CMD_RESTART', () =>
				Ref.update(state, (current) => ({ ...current, restartRequested: true })).pipe(
					Effect.zipRight(accept({ restart: 'scheduled' })),
				),
			),
			Match.exhaustive,
		)

	yield* Daemon.run({
		commands: NfcCommands,
		handle,
		onStart: initialize,
		tick: { interval: config.pollInterval, run: tick },
	})
}).pipe(Effect.withSpan('NfcDaemon'))
