import { describe, expect, it } from '@effect/vitest'
import * as Option from 'effect/Option'

import { Led as Messages } from '@hearo/schemas/messages'

import { type Layers, Led } from './led.domain.ts'

const rainbow = { brightness: 160, periodMs: 10000 }

const green = { b: 0, g: 255, r: 0 }
const red = { b: 0, g: 0, r: 255 }

const frame = (layers: Layers, nowMs: number) => Led.render(layers, nowMs, rainbow).color

const withState = (state: ConstructorParameters<typeof Messages.Commands.SetState>[0]) =>
	Led.apply(Led.initial(0), new Messages.Commands.SetState(state), 0)

describe('Led.render', () => {
	it('starts dark', () => {
		expect(frame(Led.initial(0), 0)).toEqual({ b: 0, g: 0, r: 0 })
	})

	it('shows a steady background at full brightness by default', () => {
		expect(frame(withState({ color: { b: 255, g: 40, r: 0 } }), 1000)).toEqual({ b: 255, g: 40, r: 0 })
	})

	it('clamps channels and scales by brightness', () => {
		expect(frame(withState({ color: { b: 12.7, g: -5, r: 300 } }), 0)).toEqual({ b: 12, g: 0, r: 255 })
		expect(frame(withState({ brightness: 128, color: { b: 0, g: 0, r: 255 } }), 0)).toEqual({ b: 0, g: 0, r: 128 })
	})

	it('breathes a smooth wave from dark to full over one period', () => {
		const layers = withState({ color: { b: 0, g: 100, r: 200 }, mode: 'wave', periodMs: 2000, shape: 'smooth' })

		expect(frame(layers, 0)).toEqual({ b: 0, g: 0, r: 0 })
		expect(frame(layers, 500)).toEqual({ b: 0, g: 50, r: 100 })
		expect(frame(layers, 1000)).toEqual({ b: 0, g: 100, r: 200 })
	})
})

describe('Led.waveFactor', () => {
	const wave = (state: Partial<ConstructorParameters<typeof Messages.Commands.SetState>[0]>) =>
		withState({ color: green, mode: 'wave', periodMs: 1000, ...state }).background

	it('blinks a square wave by its duty cycle', () => {
		const square = wave({ dutyCycle: 0.25, shape: 'square' })

		expect([100, 300, 1100].map((t) => Led.waveFactor(square, t))).toEqual([1, 0, 1])
	})

	it('ramps fades once and holds', () => {
		expect([250, 2000].map((t) => Led.waveFactor(wave({ shape: 'fade_in' }), t))).toEqual([0.25, 1])
		expect([250, 1500].map((t) => Led.waveFactor(wave({ shape: 'fade_out' }), t))).toEqual([0.75, 0])
	})

	it('stays at full for steady animations and waves without a period', () => {
		expect(Led.waveFactor(wave({ mode: 'steady', shape: 'square' }), 700)).toBe(1)
		expect(Led.waveFactor(wave({ periodMs: 0, shape: 'square' }), 700)).toBe(1)
	})
})

describe('feedback', () => {
	const background = withState({ color: green })

	it('overrides the background until its cycles are done', () => {
		const layers = Led.apply(background, new Messages.Commands.SetFeedback({ color: red, cycles: 2 }), 1000)

		expect(frame(layers, 1250)).toEqual(red)

		const after = Led.render(layers, 2000, rainbow)
		expect(after.color).toEqual(green)
		expect(after.layers.feedback).toEqual(Option.none())
	})

	it('expires after its duration', () => {
		const layers = Led.apply(
			background,
			new Messages.Commands.SetFeedback({ color: red, durationMs: 300, mode: 'steady' }),
			0,
		)

		expect(frame(layers, 299)).toEqual(red)
		expect(frame(layers, 300)).toEqual(green)
	})
})

describe('error rainbow', () => {
	it('overrides every layer and sweeps the hue from the first frame drawn', () => {
		const feedback = Led.apply(withState({ color: green }), new Messages.Commands.SetFeedback({ color: red }), 0)
		const error = Led.apply(feedback, new Messages.Commands.SetError({ enabled: true }), 0)

		const first = Led.render(error, 5000, rainbow)
		expect(first.color).toEqual({ b: 0, g: 0, r: 160 })
		expect(first.layers.errorSince).toEqual(Option.some(5000))

		expect(frame(first.layers, 7500)).toEqual({ b: 0, g: 160, r: 80 })
		expect(frame(first.layers, 15000)).toEqual({ b: 0, g: 0, r: 160 })
	})

	it('gives way to the lower layers when switched off', () => {
		const on = Led.apply(withState({ color: green }), new Messages.Commands.SetError({ enabled: true }), 0)
		const off = Led.apply(on, new Messages.Commands.SetError({ enabled: false }), 10)

		expect(frame(off, 20)).toEqual(green)
	})
})

describe('LED_OFF', () => {
	it('clears background, feedback and error', () => {
		const busy = Led.apply(
			Led.apply(withState({ color: green }), new Messages.Commands.SetFeedback({ color: red }), 0),
			new Messages.Commands.SetError({ enabled: true }),
			0,
		)
		const off = Led.apply(busy, new Messages.Commands.Off(), 100)

		expect(off).toEqual(Led.initial(100))
		expect(frame(off, 200)).toEqual({ b: 0, g: 0, r: 0 })
	})
})
