/**
 * GPIO Input Port - Digital input lines the button daemon samples
 *
 * Levels are logical: `pressed` means the contact is closed, whatever the line's electrical polarity.
 */

import * as Context from 'effect/Context'
import type * as Effect from 'effect/Effect'
import * as Schema from 'effect/Schema'
import type * as Scope from 'effect/Scope'

import type { Level } from '../domain/debounce.domain.ts'

export class GpioError extends Schema.TaggedError<GpioError>()('GpioError', {
	cause: Schema.optional(Schema.Defect),
	message: Schema.String,
	operation: Schema.Literal('claim', 'read'),
	pin: Schema.Int,
}) {}

export class GpioInputPort extends Context.Tag('@hearo/input/ports/GpioInputPort')<
	GpioInputPort,
	{
		/**
		 * Configures `pin` as an input for the lifetime of the current scope.
		 */
		readonly claim: (pin: number) => Effect.Effect<void, GpioError, Scope.Scope>

		readonly read: (pin: number) => Effect.Effect<Level, GpioError>
	}
>() {}
