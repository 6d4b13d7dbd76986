/**
 * LED layers and frame rendering
 *
 * ```txt
 * error rainbow (while on)  >  feedback (until it expires)  >  background
 * ```
 *
 * A frame is the active layer's color scaled by its brightness and, for a wave, by the wave factor at that instant.
 * The rainbow sweeps the hue once per error period at fixed saturation and brightness; its period starts with the
 * first frame drawn after it was switched on.
 */

import * as Match from 'effect/Match'
import * as Option from 'effect/Option'

import type { Led as Messages } from '@hearo/schemas/messages'

import type { Color } from '../ports/led-strip.port.ts'

type Mode = Messages.Commands.Mode.Type
type Shape = Messages.Commands.Shape.Type

export interface Animation {
	readonly mode: Mode
	readonly color: Color
	/** 0..255 */
	readonly brightness: number
	readonly shape: Option.Option<Shape>
	readonly periodMs: Option.Option<number>
	/** Lit share of a `square` period, 0..1 */
	readonly dutyCycle: number
	readonly cycles: Option.Option<number>
	readonly durationMs: Option.Option<number>
	readonly startMs: number
}

export interface Layers {
	readonly background: Animation
	readonly feedback: Option.Option<Animation>
	readonly errorActive: boolean
	readonly errorSince: Option.Option<number>
}

export interface ErrorRainbow {
	readonly periodMs: number
	/** 0..255 */
	readonly brightness: number
}

export type LayerCommand =
	| Messages.Commands.SetState
	| Messages.Commands.SetFeedback
	| Messages.Commands.SetError
	| Messages.Commands.Off

export const Black: Color = { b: 0, g: 0, r: 0 }

const clamp = (value: number, low: number, high: number): number => Math.min(high, Math.max(low, value))

const channel = (value: number): number => Math.trunc(clamp(value, 0, 255))

const toColor = (rgb: Messages.Commands.Rgb.Type): Color => ({ b: channel(rgb.b), g: channel(rgb.g), r: channel(rgb.r) })

const steady = (color: Color, brightness: number, startMs: number): Animation => ({
	brightness,
	color,
	cycles: Option.none(),
	dutyCycle: 0.5,
	durationMs: Option.none(),
	mode: 'steady',
	periodMs: Option.none(),
	shape: Option.none(),
	startMs,
})

const period = (animation: Animation): Option.Option<number> =>
	animation.mode === 'wave' ? Option.filter(animation.periodMs, (ms) => ms > 0) : Option.none()

/**
 * Six-sector HSV to RGB at full saturation, hue in [0, 1)
 */
const rainbow = (hue: number, brightness: number): Color => {
	const h = (hue % 1) * 6
	const f = h - Math.floor(h)
	const sectors: ReadonlyArray<readonly [number, number, number]> = [
		[1, f, 0],
		[1 - f, 1, 0],
		[0, 1, f],
		[0, 1 - f, 1],
		[f, 0, 1],
		[1, 0, 1 - f],
	]
	const [r, g, b] = sectors[Math.floor(h) % 6] ?? [0, 0, 0]

	return { b: Math.round(b * brightness), g: Math.round(g * brightness), r: Math.round(r * brightness) }
}

export const Led = {
	initial: (nowMs: number): Layers => ({
		background: steady(Black, 0, nowMs),
		errorActive: false,
		errorSince: Option.none(),
		feedback: Option.none(),
	}),

	apply: (layers: Layers, command: LayerCommand, nowMs: number): Layers =>
		Match.value(command).pipe(
			Match.tag('LED_SET_STATE', (state) => ({
				...layers,
				background: {
					brightness: clamp(state.brightness, 0, 255),
					color: toColor(state.color),
					cycles: Option.none(),
					dutyCycle: state.dutyCycle,
					durationMs: Option.none(),
					mode: state.mode,
					periodMs: Option.fromNullable(state.periodMs),
					shape: Option.fromNullable(state.shape),
					startMs: nowMs,
				},
			})),
			Match.tag('LED_SET_FEEDBACK', (feedback) => ({
				...layers,
				feedback: Option.some({
					brightness: clamp(feedback.brightness, 0, 255),
					color: toColor(feedback.color),
					cycles: Option.fromNullable(feedback.cycles),
					dutyCycle: feedback.dutyCycle,
					durationMs: Option.fromNullable(feedback.durationMs),
					mode: feedback.mode,
					periodMs: Option.some(feedback.periodMs),
					shape: Option.some(feedback.shape),
					startMs: nowMs,
				}),
			})),
			Match.tag('LED_SET_ERROR', ({ enabled }) => ({ ...layers, errorActive: enabled, errorSince: Option.none() })),
			Match.tag('LED_OFF', () => Led.initial(nowMs)),
			Match.exhaustive,
		),

	/** Whole waves completed since the animation started; always 0 unless it is a wave with a period */
	cyclesDone: (animation: Animation, nowMs: number): number =>
		Option.match(period(animation), {
			onNone: () => 0,
			onSome: (ms) => Math.floor(Math.max(0, nowMs - animation.startMs) / ms),
		}),

	/** Brightness multiplier in 0..1 */
	waveFactor: (animation: Animation, nowMs: number): number =>
		Option.match(period(animation), {
			onNone: () => 1,
			onSome: (ms) => {
				const elapsed = Math.max(0, nowMs - animation.startMs)
				const phase = (elapsed % ms) / ms

				return Match.value(Option.getOrElse(animation.shape, (): Shape => 'smooth')).pipe(
					Match.when('square', () => (phase < clamp(animation.dutyCycle, 0, 1) ? 1 : 0)),
					Match.when('fade_in', () => clamp(elapsed / ms, 0, 1)),
					Match.when('fade_out', () => clamp(1 - elapsed / ms, 0, 1)),
					Match.when('smooth', () => 0.5 - 0.5 * Math.cos(2 * Math.PI * phase)),
					Match.exhaustive,
				)
			},
		}),

	expired: (animation: Animation, nowMs: number): boolean =>
		Option.exists(animation.durationMs, (ms) => nowMs - animation.startMs >= ms) ||
		Option.exists(animation.cycles, (cycles) => Led.cyclesDone(animation, nowMs) >= cycles),

	/**
	 * The frame at `nowMs` and the layers after it: an expired feedback is dropped, the rainbow's period anchored.
	 */
	render: (layers: Layers, nowMs: number, error: ErrorRainbow): { readonly color: Color; readonly layers: Layers } => {
		if (layers.errorActive) {
			const since = Option.getOrElse(layers.errorSince, () => nowMs)
			const elapsed = (nowMs - since) % error.periodMs

			return {
				color: rainbow(elapsed / error.periodMs, error.brightness),
				layers: { ...layers, errorSince: Option.some(since) },
			}
		}

		const feedback = Option.filter(layers.feedback, (animation) => !Led.expired(animation, nowMs))
		const active = Option.getOrElse(feedback, () => layers.background)
		const scale = (active.brightness * Led.waveFactor(active, nowMs)) / 255

		return {
			color: {
				b: Math.round(active.color.b * scale),
				g: Math.round(active.color.g * scale),
				r: Math.round(active.color.r * scale),
			},
			layers: { ...layers, feedback },
		}
	},

	sameColor: (a: Color, b: Color): boolean => a.r === b.r && a.g === b.g && a.b === b.b,
} as const
