/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
import * as Schema from 'effect/Schema'

export const BatteryBand = Schema.Literal('BAT_NORM', 'BAT_LOW', 'BAT_CRIT', 'BAT_CHG')

export declare namespace BatteryBand {
	type Type = typeof BatteryBand.Type
}

export const TemperatureBand = Schema.Literal('TEMP_OK', 'TEMP_WARN', 'TEMP_CRIT')

export declare namespace TemperatureBand {
	type Type = typeof TemperatureBand.Type
}

/**
 * BatteryState - Periodic battery report
 *
 * **Wire Format (DTO)**:
 *
 * ```json
 * { "soc": 64, "band": "BAT_NORM", "ext_power": false, "temp_band": "TEMP_OK" }
 * ```
 */
export class BatteryState extends Schema.TaggedClass<BatteryState>()('POWD_EVENT_BATTERY_STATE', {
	band: BatteryBand,
	extPower: Schema.propertySignature(Schema.Boolean).pipe(Schema.fromKey('ext_power')),
	soc: Schema.Int.pipe(Schema.between(0, 100)),
	tempBand: Schema.propertySignature(TemperatureBand).pipe(Schema.fromKey('temp_band')),
}) {
	static readonly Tag = BatteryState._tag
}

/**
 * BatteryCritical - The battery entered the critical band; the orchestrator shuts the system down
 */
export class BatteryCritical extends Schema.TaggedClass<BatteryCritical>()('POWD_EVENT_BATTERY_CRITICAL', {
	soc: Schema.Int.pipe(Schema.between(0, 100)),
}) {
	static readonly Tag = BatteryCritical._tag
}

export const Events = Schema.Union(BatteryState, BatteryCritical)

export declare namespace Events {
	type Type = Schema.Schema.Type<typeof Events>
	type Tag = Type['_tag']
}
