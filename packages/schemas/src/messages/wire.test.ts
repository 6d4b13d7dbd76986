import { describe, expect, it } from '@effect/vitest'
import * as Effect from 'effect/Effect'

import * as Led from './led/index.ts'
import * as Player from './player/index.ts'
import { commandNames } from './tag.ts'
import * as Wire from './wire.ts'

describe('Wire', () => {
	it.effect('decodes a command and applies payload defaults', () =>
		Effect.gen(function* () {
			const command = yield* Wire.decode(Player.Commands.Commands)({
				name: 'PLSM_COMMAND_PLAY',
				payload: { uri: 'spotify:track:one' },
			})

			expect(command).toBeInstanceOf(Player.Commands.Play)
			expect(command).toMatchObject({ positionMs: 0, uri: 'spotify:track:one' })
		}),
	)

	it.effect('decodes a prefixed ping', () =>
		Effect.gen(function* () {
			const command = yield* Wire.decode(Player.Commands.Commands)({ name: 'PLSM_CMD_PING', payload: {} })

			expect(command).toEqual({ _tag: 'PLSM_CMD_PING' })
		}),
	)

	it.effect('encodes a seek with its wire key', () =>
		Effect.gen(function* () {
			const message = yield* Wire.encode(Player.Commands.Commands)(new Player.Commands.Seek({ deltaMs: -15000 }))

			expect(message).toEqual({ name: 'PLSM_COMMAND_SEEK', payload: { delta_ms: -15000 } })
		}),
	)
})

describe('Led commands', () => {
	it.effect('applies the feedback defaults and reads snake_case keys', () =>
		Effect.gen(function* () {
			const command = yield* Wire.decode(Led.Commands.Commands)({
				name: 'LED_SET_FEEDBACK',
				payload: { color: { b: 0, g: 0, r: 255 }, duration_ms: 400 },
			})

			expect(command).toMatchObject({
				_tag: 'LED_SET_FEEDBACK',
				brightness: 255,
				dutyCycle: 0.5,
				durationMs: 400,
				mode: 'wave',
				periodMs: 500,
				shape: 'smooth',
			})
		}),
	)

	it('lists the short LED names beside the prefixed ones', () => {
		expect([...commandNames('Led')].sort()).toEqual([
			'LEDD_CMD_PING',
			'LEDD_CMD_SET_DEBUG',
			'LED_OFF',
			'LED_PING',
			'LED_SET_ERROR',
			'LED_SET_FEEDBACK',
			'LED_SET_STATE',
		])
	})
})

describe('commandNames', () => {
	it('lists every command the player accepts', () => {
		expect([...commandNames('Player')].sort()).toEqual([
			'PLSM_CMD_PING',
			'PLSM_CMD_SET_DEBUG',
			'PLSM_COMMAND_NEXT',
			'PLSM_COMMAND_PLAY',
			'PLSM_COMMAND_PLAY_TAG',
			'PLSM_COMMAND_PREVIOUS',
			'PLSM_COMMAND_SEEK',
			'PLSM_COMMAND_SHUTDOWN',
			'PLSM_COMMAND_STATUS',
			'PLSM_COMMAND_STOP',
		])
	})
})
