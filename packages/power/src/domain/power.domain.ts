/**
 * Battery and temperature banding
 *
 * | Band        | Condition            |
 * | ----------- | -------------------- |
 * | `BAT_CHG`   | charging             |
 * | `BAT_CRIT`  | soc <= 5             |
 * | `BAT_LOW`   | soc <= 20            |
 * | `BAT_NORM`  | otherwise            |
 * | `TEMP_CRIT` | >= 60 °C             |
 * | `TEMP_WARN` | >= 45 °C             |
 * | `TEMP_OK`   | otherwise, or unknown |
 */

import * as Option from 'effect/Option'

import { Power as Messages } from '@hearo/schemas/messages'

import type { SupplyReading } from '../ports/power-supply.port.ts'

type BatteryBand = Messages.Events.BatteryBand.Type
type TemperatureBand = Messages.Events.TemperatureBand.Type

export interface Assessment {
	readonly state: Messages.Events.BatteryState
	/** Present when the battery just entered `BAT_CRIT` */
	readonly critical: Option.Option<Messages.Events.BatteryCritical>
}

const clampSoc = (soc: number): number => Math.min(100, Math.max(0, Math.round(soc)))

export const Power = {
	/** Bands the reported charge: clamped to 0-100 and rounded, as it goes out in `BATTERY_STATE` */
	batteryBand: (reading: SupplyReading): BatteryBand => {
		if (reading.charging) return 'BAT_CHG'
		const soc = clampSoc(reading.soc)
		if (soc <= 5) return 'BAT_CRIT'
		if (soc <= 20) return 'BAT_LOW'
		return 'BAT_NORM'
	},

	temperatureBand: (temperatureC: number | null): TemperatureBand => {
		if (temperatureC === null) return 'TEMP_OK'
		if (temperatureC >= 60) return 'TEMP_CRIT'
		if (temperatureC >= 45) return 'TEMP_WARN'
		return 'TEMP_OK'
	},

	/**
	 * Bands a reading; `previous` is the band of the last report, if any.
	 */
	assess: (previous: Option.Option<BatteryBand>, reading: SupplyReading): Assessment => {
		const soc = clampSoc(reading.soc)
		const band = Power.batteryBand(reading)

		return {
			critical:
				band === 'BAT_CRIT' && !Option.contains(previous, 'BAT_CRIT')
					? Option.some(new Messages.Events.BatteryCritical({ soc }))
					: Option.none(),
			state: new Messages.Events.BatteryState({
				band,
				extPower: reading.extPower,
				soc,
				tempBand: Power.temperatureBand(reading.temperatureC),
			}),
		}
	},
} as const
