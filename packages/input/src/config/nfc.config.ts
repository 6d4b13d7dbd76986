import * as Config from 'effect/Config'
import * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'

import type { Thresholds } from '../domain/debounce.domain.ts'

/**
 * Tag presence as a debounced input: present for 300ms to add, absent for 600ms to remove, a heartbeat every second.
 * Every stable presence is an interaction, hence no short or long minimum.
 */
export const presence: Thresholds = {
	debounceMs: 300,
	holdTickIntervalMs: 1000,
	longThresholdMs: 0,
	releaseDebounceMs: 600,
	shortMinMs: 0,
}

/**
 * NfcConfig - Reader polling
 *
 * | Variable               | Default |
 * | ---------------------- | ------- |
 * | `HEARO_NFC_POLL_MS`    | `50`    |
 * | `HEARO_NFC_RECOVER_MS` | `5000`  |
 */
export class NfcConfig extends Effect.Service<NfcConfig>()('@hearo/input/config/NfcConfig', {
	effect: Effect.gen(function* () {
		const config = yield* Config.all({
			pollMs: Config.integer('HEARO_NFC_POLL_MS').pipe(Config.withDefault(50)),
			recoverMs: Config.integer('HEARO_NFC_RECOVER_MS').pipe(Config.withDefault(5000)),
		})

		return {
			pollInterval: Duration.millis(config.pollMs),
			pollIntervalMs: config.pollMs,
			recoverMs: config.recoverMs,
			thresholds: presence,
		}
	}),
}) {}
