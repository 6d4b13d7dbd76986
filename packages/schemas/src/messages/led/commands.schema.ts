/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
/**
 * LED daemon commands
 *
 * The strip shows one of three layers, highest first: the error rainbow, a timed feedback animation, the background
 * state. Channel values outside 0..255 are clamped by the daemon.
 */

import * as Schema from 'effect/Schema'

import { Ping, SetDebug } from '../common/commands.schema.ts'

export const Rgb = Schema.Struct({
	b: Schema.Number,
	g: Schema.Number,
	r: Schema.Number,
})

export declare namespace Rgb {
	type Type = typeof Rgb.Type
}

export const Mode = Schema.Literal('steady', 'wave')

export declare namespace Mode {
	type Type = typeof Mode.Type
}

/** Wave shapes: on/off by duty cycle, cosine, a single ramp up or down */
export const Shape = Schema.Literal('square', 'smooth', 'fade_in', 'fade_out')

export declare namespace Shape {
	type Type = typeof Shape.Type
}

const brightness = Schema.optionalWith(Schema.Number, { default: () => 255 })
const dutyCycle = Schema.optionalWith(Schema.Number, { default: () => 0.5 }).pipe(Schema.fromKey('duty_cycle'))

/**
 * SetState - replace the background animation
 *
 * **Wire format**: `{ "color": { "r": 0, "g": 40, "b": 255 }, "mode": "wave", "shape": "smooth", "period_ms": 2000 }`
 */
export class SetState extends Schema.TaggedClass<SetState>()('LED_SET_STATE', {
	brightness,
	color: Rgb,
	dutyCycle,
	mode: Schema.optionalWith(Mode, { default: () => 'steady' as const }),
	periodMs: Schema.optional(Schema.Number).pipe(Schema.fromKey('period_ms')),
	shape: Schema.optional(Shape),
}) {
	static readonly Tag = SetState._tag
}

/**
 * SetFeedback - show a short animation over the background until `cycles` waves or `duration_ms` have passed
 *
 * Without either limit the feedback stays until replaced or cleared by `LED_OFF`.
 */
export class SetFeedback extends Schema.TaggedClass<SetFeedback>()('LED_SET_FEEDBACK', {
	brightness,
	color: Rgb,
	cycles: Schema.optional(Schema.Int),
	dutyCycle,
	durationMs: Schema.optional(Schema.Number).pipe(Schema.fromKey('duration_ms')),
	mode: Schema.optionalWith(Mode, { default: () => 'wave' as const }),
	periodMs: Schema.optionalWith(Schema.Number, { default: () => 500 }).pipe(Schema.fromKey('period_ms')),
	shape: Schema.optionalWith(Shape, { default: () => 'smooth' as const }),
}) {
	static readonly Tag = SetFeedback._tag
}

/**
 * SetError - turn the error rainbow on or off; it overrides every other layer while on
 */
export class SetError extends Schema.TaggedClass<SetError>()('LED_SET_ERROR', {
	enabled: Schema.optionalWith(Schema.Boolean, { default: () => false }),
}) {
	static readonly Tag = SetError._tag
}

/**
 * Off - dark background, no feedback, no error
 */
export class Off extends Schema.TaggedClass<Off>()('LED_OFF', {}) {
	static readonly Tag = Off._tag
}

/** Short ping answered with the layer flags, kept beside the prefixed one */
export const LedPing = Ping('LED_PING')
export const LeddPing = Ping('LEDD_CMD_PING')
export const LeddSetDebug = SetDebug('LEDD_CMD_SET_DEBUG')

export const Commands = Schema.Union(LeddPing, LeddSetDebug, LedPing, SetState, SetFeedback, SetError, Off)

export declare namespace Commands {
	type Type = Schema.Schema.Type<typeof Commands>
	type Tag = Type['_tag']
}
