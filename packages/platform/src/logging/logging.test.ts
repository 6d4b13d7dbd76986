import { describe, expect, it } from '@effect/vitest'
import * as ConfigProvider from 'effect/ConfigProvider'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as LogLevel from 'effect/LogLevel'
import * as Option from 'effect/Option'

import * as Platform from '../index.ts'
import { LogThreshold, parseLogLevel } from './logging.ts'

const withLevel = (level: string) =>
	LogThreshold.Default.pipe(
		Layer.provide(Layer.setConfigProvider(ConfigProvider.fromMap(new Map([['HEARO_LOG_LEVEL', level]])))),
	)

describe('parseLogLevel', () => {
	it('accepts the supported names in any case', () => {
		expect(parseLogLevel('WARNING')).toEqual(Option.some(LogLevel.Warning))
		expect(parseLogLevel(' warn ')).toEqual(Option.some(LogLevel.Warning))
		expect(parseLogLevel('none')).toEqual(Option.some(LogLevel.None))
	})

	it('refuses anything else', () => {
		expect(parseLogLevel('verbose')).toEqual(Option.none())
	})
})

describe('LogThreshold', () => {
	it.effect('starts from HEARO_LOG_LEVEL', () =>
		Effect.gen(function* () {
			const threshold = yield* LogThreshold

			expect(threshold.allows(LogLevel.Warning)).toBe(false)
			expect(threshold.allows(LogLevel.Error)).toBe(true)
		}).pipe(Effect.provide(withLevel('error'))),
	)

	it.effect('falls back to info for an unknown configured level', () =>
		Effect.gen(function* () {
			const threshold = yield* LogThreshold

			expect(yield* threshold.current).toBe(LogLevel.Info)
		}).pipe(Effect.provide(withLevel('chatty'))),
	)

	it.effect('lets debug through after set("debug")', () =>
		Effect.gen(function* () {
			const threshold = yield* LogThreshold

			yield* threshold.set('debug')

			expect(threshold.allows(LogLevel.Debug)).toBe(true)
		}).pipe(Effect.provide(withLevel('info'))),
	)

	it.effect('silences everything at none', () =>
		Effect.gen(function* () {
			const threshold = yield* LogThreshold

			yield* threshold.set('none')

			expect(threshold.allows(LogLevel.Fatal)).toBe(false)
		}).pipe(Effect.provide(withLevel('info'))),
	)
})

describe('package entry point', () => {
	it('exposes the threshold service beside the Logging namespace', () => {
		expect(Platform.LogThreshold).toBe(LogThreshold)
		expect(Platform.parseLogLevel).toBe(parseLogLevel)
		expect(Platform.Logging.LogThreshold).toBe(LogThreshold)
	})
})
