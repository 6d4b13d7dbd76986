import * as Config from 'effect/Config'
import * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'

import type { Button } from '@hearo/schemas/messages'

import type { Thresholds } from '../domain/debounce.domain.ts'

export interface ButtonSpec {
	readonly name: Button.Events.ButtonName.Type
	/** BCM pin number */
	readonly gpio: number
	readonly thresholds: Thresholds
}

const standard: Thresholds = {
	debounceMs: 30,
	holdTickIntervalMs: 250,
	longThresholdMs: 800,
	shortMinMs: 50,
}

/**
 * RESET needs a deliberate five second hold
 */
const reset: Thresholds = { ...standard, longThresholdMs: 5000 }

const pin = (name: Button.Events.ButtonName.Type, fallback: number) =>
	Config.integer(`HEARO_BUTTON_GPIO_${name}`).pipe(Config.withDefault(fallback))

/**
 * ButtonConfig - The button catalogue and polling period
 *
 * | Variable                      | Default |
 * | ----------------------------- | ------- |
 * | `HEARO_BUTTON_GPIO_NEXT`      | `17`    |
 * | `HEARO_BUTTON_GPIO_PREV`      | `22`    |
 * | `HEARO_BUTTON_GPIO_VOL_UP`    | `23`    |
 * | `HEARO_BUTTON_GPIO_VOL_DOWN`  | `27`    |
 * | `HEARO_BUTTON_GPIO_RESET`     | `24`    |
 * | `HEARO_BUTTON_POLL_MS`        | `10`    |
 */
export class ButtonConfig extends Effect.Service<ButtonConfig>()('@hearo/input/config/ButtonConfig', {
	effect: Effect.gen(function* () {
		const config = yield* Config.all({
			next: pin('NEXT', 17),
			pollMs: Config.integer('HEARO_BUTTON_POLL_MS').pipe(Config.withDefault(10)),
			prev: pin('PREV', 22),
			reset: pin('RESET', 24),
			volDown: pin('VOL_DOWN', 27),
			volUp: pin('VOL_UP', 23),
		})

		const buttons: ReadonlyArray<ButtonSpec> = [
			{ gpio: config.next, name: 'NEXT', thresholds: standard },
			{ gpio: config.prev, name: 'PREV', thresholds: standard },
			{ gpio: config.volUp, name: 'VOL_UP', thresholds: standard },
			{ gpio: config.volDown, name: 'VOL_DOWN', thresholds: standard },
			{ gpio: config.reset, name: 'RESET', thresholds: reset },
		]

		yield* Effect.logDebug('Button configuration loaded', {
			buttons: buttons.map(({ gpio, name }) => `${name}@${gpio}`),
			pollMs: config.pollMs,
		})

		return { buttons, pollInterval: Duration.millis(config.pollMs) }
	}),
}) {}
