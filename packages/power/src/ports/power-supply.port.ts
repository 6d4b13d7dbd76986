import * as Context from 'effect/Context'
import type * as Effect from 'effect/Effect'
import * as Schema from 'effect/Schema'

export class PowerSupplyError extends Schema.TaggedError<PowerSupplyError>()('PowerSupplyError', {
	cause: Schema.optional(Schema.Defect),
	message: Schema.String,
}) {}

export interface SupplyReading {
	/** State of charge, 0..100 */
	readonly soc: number
	readonly charging: boolean
	/** Mains or USB power present */
	readonly extPower: boolean
	/** Battery temperature in °C, `null` without a sensor */
	readonly temperatureC: number | null
}

/**
 * PowerSupplyPort - Battery gauge of the device
 */
export class PowerSupplyPort extends Context.Tag('@hearo/power/ports/PowerSupplyPort')<
	PowerSupplyPort,
	{
		readonly read: Effect.Effect<SupplyReading, PowerSupplyError>
	}
>() {}
