import { describe, expect, it } from '@effect/vitest'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as TestClock from 'effect/TestClock'

import { Endpoints, LogThreshold } from '@hearo/platform'
import { nextEvent, probe, ReplyEndpoint, sendCommand, TestBus } from '@hearo/platform/testing'

import { SimulatedBattery } from '../adapters/simulated-power-supply.adapter.ts'
import { PowerConfig } from '../config/power.config.ts'
import { powerDaemon } from './power.daemon.ts'

const TestLayer = Layer.mergeAll(TestBus('powd'), LogThreshold.Default, SimulatedBattery.Test, PowerConfig.Default)

/**
 * Starts the daemon and waits for DAEMON_STARTED; reports are due at 0s, 30s, 60s, ...
 */
const start = Effect.gen(function* () {
	const events = yield* probe(Endpoints.events)
	const battery = yield* SimulatedBattery

	yield* powerDaemon.pipe(Effect.scoped, Effect.fork)
	yield* nextEvent(events)

	return { battery, events } as const
})

describe('powerDaemon', () => {
	it.scoped('reports the battery right away and every 30 seconds', () =>
		Effect.gen(function* () {
			const { battery, events } = yield* start

			expect(yield* nextEvent(events)).toMatchObject({
				_tag: 'POWD_EVENT_BATTERY_STATE',
				band: 'BAT_NORM',
				extPower: false,
				soc: 80,
				tempBand: 'TEMP_OK',
			})

			yield* battery.set({ charging: true, extPower: true, soc: 81 })
			yield* TestClock.adjust('30 seconds')

			expect(yield* nextEvent(events)).toMatchObject({ band: 'BAT_CHG', extPower: true, soc: 81 })
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('raises BATTERY_CRITICAL once when entering the critical band', () =>
		Effect.gen(function* () {
			/**
			 * GIVEN a battery reported at 80%
			 * WHEN it reads 5% and then 4% on the next two reports
			 * THEN the first of them is followed by BATTERY_CRITICAL and the second is not
			 */
			const { battery, events } = yield* start
			yield* nextEvent(events)

			yield* battery.set({ soc: 5 })
			yield* TestClock.adjust('30 seconds')

			expect(yield* nextEvent(events)).toMatchObject({ _tag: 'POWD_EVENT_BATTERY_STATE', band: 'BAT_CRIT', soc: 5 })
			expect(yield* nextEvent(events)).toMatchObject({ _tag: 'POWD_EVENT_BATTERY_CRITICAL', soc: 5 })

			yield* battery.set({ soc: 4 })
			yield* TestClock.adjust('30 seconds')
			yield* battery.set({ soc: 30 })
			yield* TestClock.adjust('30 seconds')

			expect(yield* nextEvent(events)).toMatchObject({ _tag: 'POWD_EVENT_BATTERY_STATE', soc: 4 })
			expect(yield* nextEvent(events)).toMatchObject({ _tag: 'POWD_EVENT_BATTERY_STATE', soc: 30 })
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('reports a failing gauge once per streak', () =>
		Effect.gen(function* () {
			const { battery, events } = yield* start
			yield* nextEvent(events)

			yield* battery.fail('capacity: EIO')
			yield* TestClock.adjust('60 seconds')

			expect(yield* nextEvent(events)).toEqual({
				_tag: 'POWD_EVENT_ERROR',
				code: 'GAUGE_READ_FAILED',
				message: 'capacity: EIO',
				recovering: true,
			})

			yield* battery.set({ soc: 70 })
			yield* TestClock.adjust('30 seconds')

			expect(yield* nextEvent(events)).toMatchObject({ _tag: 'POWD_EVENT_BATTERY_STATE', soc: 70 })
		}).pipe(Effect.provide(TestLayer)),
	)

	it.scoped('answers a ping with the last report', () =>
		Effect.gen(function* () {
			const { events } = yield* start
			const replies = yield* probe(ReplyEndpoint)
			yield* nextEvent(events)

			yield* sendCommand(Endpoints.command('powd'), { name: 'POWD_CMD_PING', payload: {} })
			yield* replies.next
			const result = yield* replies.next

			expect(result.schema === 'result' && result.payload).toMatchObject({
				band: 'BAT_NORM',
				daemon: 'powd',
				last_error_code: null,
				soc: 80,
				temp_band: 'TEMP_OK',
			})
		}).pipe(Effect.provide(TestLayer)),
	)
})
