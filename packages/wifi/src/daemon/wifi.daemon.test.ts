import { describe, expect, it } from '@effect/vitest'
import type * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as TestClock from 'effect/TestClock'

import { Endpoints, LogThreshold } from '@hearo/platform'
import { nextEvent, probe, ReplyEndpoint, sendCommand, TestBus } from '@hearo/platform/testing'

import { SimulatedNetwork } from '../adapters/simulated-network-stack.adapter.ts'
import { WifiConfig } from '../config/wifi.config.ts'
import { wifiDaemon } from './wifi.daemon.ts'

const TestLayer = Layer.mergeAll(TestBus('wsm'), LogThreshold.Default, SimulatedNetwork.Test, WifiConfig.Default)

const home = { ip: '192.168.1.23', rssi: -52, ssid: 'home' }

/**
 * Starts the daemon (ticking every 500ms from 0ms) once `arrange` has set up the network, and waits for
 * DAEMON_STARTED.
 */
const start = <E = never, R = never>(
	arrange: (network: Context.Tag.Service<SimulatedNetwork>) => Effect.Effect<void, E, R> = () => Effect.void,
) =>
	Effect.gen(function* () {
		const events = yield* probe(Endpoints.events)
		const network = yield* SimulatedNetwork

		yield* arrange(network)
		yield* wifiDaemon.pipe(Effect.scoped, Effect.fork)
		yield* nextEvent(events)

		return { events, network } as const
	})

describe('wifiDaemon', () => {
	it.scoped('moves from access point mode to connected once the station is online', () =>
		Effect.gen(function* () {
			/**
			 * GIVEN the network tooling is present
			 * WHEN the station joins `home` and the internet answers before the first retry (5s)
			 * THEN the access point comes up, then CONNECTED, AP_STOPPED and the move to Connected are published
			 */
			const { events, network } = yield* start()

			expect(yield* nextEvent(events)).toEqual({ _tag: 'WSM_EVENT_STATE_CHANGED', from: 'Init', to: 'AccessPoint' })

			yield* TestClock.adjust('500 millis')
			expect(yield* nextEvent(events)).toMatchObject({
				_tag: 'WSM_EVENT_WIFI_AP_STARTED',
				channel: 6,
				security: 'WPA2-PSK',
				ssid: 'Hearo-Setup',
			})

			yield* network.join(home)
			yield* network.setInternet(true)
			yield* TestClock.adjust('5 seconds')

			expect(yield* nextEvent(events)).toMatchObject({ _tag: 'WSM_EVENT_WIFI_CONNECTED', ...home })
			expect(yield* nextEvent(events)).toMatchObject({ _tag: 'WSM_EVENT_WIFI_AP_STOPPED', reason: 'station_connected' })
			expect(yield* nextEvent(events)).toEqual({ _tag: 'WSM_EVENT_STATE_CHANGED', from: 'AccessPoint', to: 'Connected' })
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('falls back to access point mode when the link drops', () =>
		Effect.gen(function* () {
			const { events, network } = yield* start((network) =>
				network.join(home).pipe(Effect.zipRight(network.setInternet(true))),
			)

			yield* TestClock.adjust('500 millis')
			// STATE_CHANGED(AccessPoint), AP_STARTED, CONNECTED, AP_STOPPED, STATE_CHANGED(Connected)
			for (let skipped = 0; skipped < 5; skipped++) {
				yield* nextEvent(events)
			}

			yield* network.drop
			yield* TestClock.adjust('5 seconds')

			expect(yield* nextEvent(events)).toMatchObject({
				_tag: 'WSM_EVENT_WIFI_LOST',
				failStreak: 0,
				ip: null,
				reason: 'link_down',
				ssid: null,
			})
			expect(yield* nextEvent(events)).toEqual({ _tag: 'WSM_EVENT_STATE_CHANGED', from: 'Connected', to: 'AccessPoint' })

			yield* TestClock.adjust('500 millis')
			expect((yield* nextEvent(events))._tag).toBe('WSM_EVENT_WIFI_AP_STARTED')
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('waits in Error until the tooling shows up', () =>
		Effect.gen(function* () {
			const { events, network } = yield* start((network) => network.setStackAvailable(false))

			expect(yield* nextEvent(events)).toEqual({
				_tag: 'WSM_EVENT_ERROR',
				code: 'ERR_NO_WPA_CLI',
				message: 'wpa_cli not available',
				recovering: true,
			})
			expect(yield* nextEvent(events)).toEqual({ _tag: 'WSM_EVENT_STATE_CHANGED', from: 'Init', to: 'Error' })

			yield* network.setStackAvailable(true)
			yield* TestClock.adjust('5 seconds')

			expect(yield* nextEvent(events)).toEqual({ _tag: 'WSM_EVENT_STATE_CHANGED', from: 'Error', to: 'AccessPoint' })
			expect((yield* network.calls).filter((call) => call === 'checkStack')).toHaveLength(2)
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('answers WSM_COMMAND_STATUS with the current snapshot', () =>
		Effect.gen(function* () {
			yield* start()
			const replies = yield* probe(ReplyEndpoint)

			yield* TestClock.adjust('500 millis')
			yield* sendCommand(Endpoints.command('wsm'), { name: 'WSM_COMMAND_STATUS', payload: {} })
			yield* replies.next
			const result = yield* replies.next

			expect(result.schema === 'result' && result.payload).toEqual({
				ap_mode: { active: true, clients: 0, ssid: 'Hearo-Setup' },
				internet: { fail_streak: 0, last_check_ms_ago: null, spotify_reachable: false },
				last_error_code: null,
				state: 'AccessPoint',
				station: { connected: false, ip: null, rssi: null, ssid: null },
				uptime_ms: 500,
			})
		}).pipe(Effect.provide(TestLayer)),
	)
})
