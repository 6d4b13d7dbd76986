import * as Context from 'effect/Context'
import type * as Effect from 'effect/Effect'
import * as Schema from 'effect/Schema'

export class LedStripError extends Schema.TaggedError<LedStripError>()('LedStripError', {
	cause: Schema.optional(Schema.Defect),
	message: Schema.String,
}) {}

/** One color, each channel an integer in 0..255 */
export interface Color {
	readonly r: number
	readonly g: number
	readonly b: number
}

/**
 * LedStripPort - The addressable LEDs of the device; every LED shows the same color
 */
export class LedStripPort extends Context.Tag('@hearo/led/ports/LedStripPort')<
	LedStripPort,
	{
		readonly show: (color: Color) => Effect.Effect<void, LedStripError>
	}
>() {}
