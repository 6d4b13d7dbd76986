/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
import * as Schema from 'effect/Schema'

export const ButtonName = Schema.Literal('NEXT', 'PREV', 'VOL_UP', 'VOL_DOWN', 'RESET')

export declare namespace ButtonName {
	type Type = typeof ButtonName.Type
}

export const InteractionKind = Schema.Literal('SHORT_PRESS', 'LONG_PRESS', 'HOLD_TICK')

export declare namespace InteractionKind {
	type Type = typeof InteractionKind.Type
}

/**
 * ButtonPressed - A debounced, classified interaction on a physical button
 *
 * **Produced by**: button daemon (`bd`) **Consumed by**: orchestrator
 *
 * **Wire Format (DTO)**:
 *
 * ```json
 * { "button": "NEXT", "interaction": "SHORT_PRESS", "duration_ms": 180, "sequence": 4 }
 * ```
 */
export class ButtonPressed extends Schema.TaggedClass<ButtonPressed>()('BD_EVENT_BUTTON', {
	button: ButtonName,
	durationMs: Schema.propertySignature(Schema.NonNegativeInt).pipe(Schema.fromKey('duration_ms')),
	interaction: InteractionKind,
	/** Per-button counter, incremented once per emitted interaction */
	sequence: Schema.Int,
}) {
	static readonly Tag = ButtonPressed._tag
}

export declare namespace ButtonPressed {
	type Type = Schema.Schema.Type<typeof ButtonPressed>
	type Dto = Schema.Schema.Encoded<typeof ButtonPressed>
}

export const Events = Schema.Union(ButtonPressed)

export declare namespace Events {
	type Type = Schema.Schema.Type<typeof Events>
	type Tag = Type['_tag']
}
