/**
 * Wi-Fi peer daemon (`wsm`)
 *
 * ```
 * Init --stack ok--> AccessPoint --station up and internet reachable--> Connected
 *   |                  ^                                                  |
 *   +--stack missing--> Error --stack ok (on backoff)---------------------+--lost--> AccessPoint
 * ```
 *
 * In `AccessPoint` the setup network is kept up and the station is retried on the peer backoff. `Connected` refreshes
 * the station every 5s and probes the internet every 10s.
 */

import * as Clock from 'effect/Clock'
import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Match from 'effect/Match'
import * as Option from 'effect/Option'
import * as Ref from 'effect/Ref'

import {
	Backoff,
	bounded,
	type CommandHandler,
	type CommandSet,
	Daemon,
	DaemonContext,
	DaemonIdentity,
	EventPublisher,
	type LogThreshold,
	type PeerUnavailable,
	ping,
	setDebug,
} from '@hearo/platform'
import { commandNames, Lifecycle, Wifi } from '@hearo/schemas/messages'

import { WifiConfig } from '../config/wifi.config.ts'
import { WifiPeer, type WifiState } from '../domain/wifi-peer.domain.ts'
import { NetworkStackPort } from '../ports/network-stack.port.ts'

export const WifiCommands: CommandSet<typeof Wifi.Commands.Commands.Type, typeof Wifi.Commands.Commands.Encoded> = {
	names: commandNames('Wifi'),
	schema: Wifi.Commands.Commands,
}

export const wifiDaemon = Effect.gen(function* () {
	const config = yield* WifiConfig
	const stack = yield* NetworkStackPort
	const publisher = yield* EventPublisher
	const identity = yield* DaemonIdentity

	const peer = yield* Ref.make(WifiPeer.initial(config.backoff, yield* Clock.currentTimeMillis))

	const call = <A>(operation: string, effect: Effect.Effect<A, PeerUnavailable>) =>
		Effect.either(effect.pipe(bounded(operation, config.callTimeout)))

	const reportError = (error: PeerUnavailable) =>
		Effect.gen(function* () {
			yield* Effect.logWarning('Network stack call failed', { code: error.code, kind: error.kind, message: error.message })
			yield* Ref.update(peer, (current) => ({ ...current, lastErrorCode: error.code }))
			yield* publisher.publish({
				_tag: Lifecycle.Events.name.DaemonError[identity.id],
				code: error.code,
				message: error.message,
				recovering: true,
			})
		})

	const transition = (to: WifiState, nowMs: number) =>
		Effect.gen(function* () {
			const { state: from } = yield* Ref.get(peer)
			if (from === to) return

			yield* Ref.update(peer, (current) => ({
				...current,
				backoff: to === 'AccessPoint' ? Backoff.make(config.backoff, nowMs) : current.backoff,
				nextInternetCheckAtMs: nowMs + config.internetCheckMs,
				nextStationCheckAtMs: nowMs + config.stationRefreshMs,
				state: to,
			}))
			yield* Effect.logInfo('Wi-Fi state changed', { from, to })
			yield* publisher.publish({ _tag: 'WSM_EVENT_STATE_CHANGED', from, to })
		})

	const refreshStation = Effect.gen(function* () {
		const report = yield* call('station', stack.station)

		if (Either.isLeft(report)) {
			yield* reportError(report.left)
		}

		const station = Either.match(report, {
			onLeft: () => WifiPeer.station({ ip: null, rssi: null, ssid: null }),
			onRight: WifiPeer.station,
		})
		yield* Ref.update(peer, (current) => ({ ...current, station }))
		return station
	})

	const probeInternet = (nowMs: number) =>
		Effect.gen(function* () {
			const probe = yield* call('internetReachable', stack.internetReachable)

			if (Either.isLeft(probe)) {
				yield* reportError(probe.left)
			}

			const reachable = Either.getOrElse(probe, () => false)
			yield* Ref.update(peer, (current) => ({
				...current,
				internet: WifiPeer.recordProbe(current.internet, reachable, nowMs),
			}))
		})

	/**
	 * Verifies the supplicant tooling; returns whether it is usable.
	 */
	const checkStack = Effect.gen(function* () {
		const outcome = yield* call('checkStack', stack.checkStack)
		if (Either.isLeft(outcome)) {
			yield* reportError(outcome.left)
		}
		return Either.isRight(outcome)
	})

	const enterError = (nowMs: number) =>
		transition('Error', nowMs).pipe(
			Effect.zipRight(
				Ref.update(peer, (current) => ({
					...current,
					backoff: Backoff.advance(Backoff.make(config.backoff, nowMs), nowMs),
				})),
			),
		)

	const onInit = (nowMs: number) =>
		Effect.if(checkStack, { onFalse: () => enterError(nowMs), onTrue: () => transition('AccessPoint', nowMs) })

	const onAccessPoint = (nowMs: number) =>
		Effect.gen(function* () {
			if (!(yield* Ref.get(peer)).accessPoint.active) {
				const started = yield* call('startAccessPoint', stack.startAccessPoint)

				if (Either.isLeft(started)) {
					yield* reportError(started.left)
				} else {
					yield* Ref.update(peer, (current) => ({
						...current,
						accessPoint: { ...current.accessPoint, active: true, ssid: config.accessPoint.ssid },
					}))
					yield* Effect.logInfo('Access point started', { ssid: config.accessPoint.ssid })
					yield* publisher.publish(new Wifi.Events.AccessPointStarted(config.accessPoint))
				}
			}

			if (Backoff.isDue((yield* Ref.get(peer)).backoff, nowMs)) {
				const station = yield* refreshStation

				if (station.connected) {
					yield* probeInternet(nowMs)
				} else {
					const reconnect = yield* call('reconnect', stack.reconnect)
					if (Either.isLeft(reconnect)) {
						yield* Effect.logDebug('Reconnect request failed', { message: reconnect.left.message })
					}
				}

				yield* Ref.update(peer, (current) => ({ ...current, backoff: Backoff.advance(current.backoff, nowMs) }))
			}

			const current = yield* Ref.get(peer)
			if (!current.station.connected || !current.internet.reachable) return

			yield* publisher.publish(
				new Wifi.Events.WifiConnected({
					ip: current.station.ip ?? '',
					rssi: current.station.rssi,
					ssid: current.station.ssid ?? '',
				}),
			)

			if (current.accessPoint.active) {
				const stopped = yield* call('stopAccessPoint', stack.stopAccessPoint)
				if (Either.isLeft(stopped)) {
					yield* reportError(stopped.left)
				}
				yield* Ref.update(peer, (latest) => ({ ...latest, accessPoint: { ...latest.accessPoint, active: false } }))
				yield* publisher.publish(new Wifi.Events.AccessPointStopped({ reason: 'station_connected' }))
			}

			yield* transition('Connected', nowMs)
			yield* Ref.update(peer, (latest) => ({ ...latest, backoff: Backoff.reset(latest.backoff, nowMs) }))
		})

	const onConnected = (nowMs: number) =>
		Effect.gen(function* () {
			if (nowMs >= (yield* Ref.get(peer)).nextStationCheckAtMs) {
				yield* refreshStation
				yield* Ref.update(peer, (current) => ({
					...current,
					nextStationCheckAtMs: nowMs + config.stationRefreshMs,
				}))
			}

			if (nowMs >= (yield* Ref.get(peer)).nextInternetCheckAtMs) {
				yield* probeInternet(nowMs)
				yield* Ref.update(peer, (current) => ({
					...current,
					nextInternetCheckAtMs: nowMs + config.internetCheckMs,
				}))
			}

			const current = yield* Ref.get(peer)
			const reason = WifiPeer.lostReason(current)
			if (Option.isNone(reason)) return

			yield* Effect.logWarning('Wi-Fi connectivity lost', { reason: reason.value })
			yield* publisher.publish(
				new Wifi.Events.WifiLost({
					failStreak: current.internet.failStreak,
					ip: current.station.ip,
					reason: reason.value,
					ssid: current.station.ssid,
				}),
			)
			yield* transition('AccessPoint', nowMs)
		})

	const onError = (nowMs: number) =>
		Effect.gen(function* () {
			if (!Backoff.isDue((yield* Ref.get(peer)).backoff, nowMs)) return

			if (yield* checkStack) {
				return yield* transition('AccessPoint', nowMs)
			}
			yield* Ref.update(peer, (current) => ({ ...current, backoff: Backoff.advance(current.backoff, nowMs) }))
		})

	const tick = Effect.gen(function* () {
		const nowMs = yield* Clock.currentTimeMillis
		const { state } = yield* Ref.get(peer)

		yield* Match.value(state).pipe(
			Match.when('Init', () => onInit(nowMs)),
			Match.when('AccessPoint', () => onAccessPoint(nowMs)),
			Match.when('Connected', () => onConnected(nowMs)),
			Match.when('Error', () => onError(nowMs)),
			Match.exhaustive,
		)
	})

	const status = Effect.gen(function* () {
		const context = yield* DaemonContext
		return WifiPeer.status(yield* Ref.get(peer), yield* Clock.currentTimeMillis, yield* context.uptimeMs)
	})

	const handle: CommandHandler<typeof Wifi.Commands.Commands.Type, DaemonIdentity | DaemonContext | LogThreshold> = (
		command,
	) =>
		Match.value(command).pipe(
			Match.tag('WSM_CMD_PING', () =>
				ping(Ref.get(peer).pipe(Effect.map((current) => ({ last_error_code: current.lastErrorCode, state: current.state })))),
			),
			Match.tag('WSM_CMD_SET_DEBUG', ({ level }) => setDebug(level)),
			Match.tag('WSM_COMMAND_STATUS', () => Effect.succeed(status)),
			Match.exhaustive,
		)

	yield* Daemon.run({
		commands: WifiCommands,
		handle,
		tick: { interval: config.tickInterval, run: tick },
	})
}).pipe(Effect.withSpan('WifiDaemon'))
