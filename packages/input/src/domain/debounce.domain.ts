/**
 * Debounce - Interaction classifier for one binary input
 *
 * Turns a stream of raw level samples into debounced, classified interactions. The same machine drives the buttons
 * (pressed = contact closed) and the NFC reader (pressed = tag in the field); only the thresholds differ.
 *
 * ```txt
 *          stable press                        pressed for longThresholdMs
 *   Idle ───────────────▶ Pressed ─────────────────────────────────────▶ LongHeld ──┐ every holdTickIntervalMs
 *    ▲                       │ stable release                                │  ◀──┘ HoldTick
 *    │                       │   d < shortMinMs       → (noise)              │ stable release
 *    │                       │   d < longThresholdMs  → ShortPress(d)        │   d ≥ longThresholdMs → LongPress(d)
 *    │                       │   otherwise            → LongPress(d)         │   d ≥ shortMinMs      → ShortPress(d)
 *    └───────────────────────┴───────────────────────────────────────────────┘
 * ```
 *
 * Durations are measured edge to edge: `d` runs from the press edge to the release edge, not from the moment each
 * edge was confirmed. {@link Debounce.step} is pure; the caller owns the clock and the sampling period.
 */

import * as Data from 'effect/Data'
import * as Option from 'effect/Option'

export type Level = 'pressed' | 'released'

export interface Thresholds {
	/** How long a press edge must be stable before it is acted on */
	readonly debounceMs: number
	/** How long a release edge must be stable; defaults to {@link Thresholds.debounceMs} */
	readonly releaseDebounceMs?: number
	/** Presses shorter than this are noise */
	readonly shortMinMs: number
	readonly longThresholdMs: number
	readonly holdTickIntervalMs: number
}

export type TrackerState = 'Idle' | 'Pressed' | 'LongHeld'

export interface Tracker {
	readonly state: TrackerState
	/** Last raw level sampled */
	readonly lastLevel: Level
	/** Time of the last raw level change */
	readonly lastChangeMs: number
	readonly pressStartMs: number
	readonly lastHoldTickMs: number
	/** Number of interactions emitted so far */
	readonly sequence: number
}

export interface Sample {
	readonly level: Level
	readonly nowMs: number
}

export type Interaction = Data.TaggedEnum<{
	ShortPress: { readonly durationMs: number; readonly sequence: number }
	LongPress: { readonly durationMs: number; readonly sequence: number }
	HoldTick: { readonly durationMs: number; readonly sequence: number }
}>

export const Interaction = Data.taggedEnum<Interaction>()

export interface Step {
	readonly tracker: Tracker
	readonly interaction: Option.Option<Interaction>
}

const unchanged = (tracker: Tracker): Step => ({ interaction: Option.none(), tracker })

const emit = (tracker: Tracker, make: (sequence: number) => Interaction): Step => {
	const sequence = tracker.sequence + 1
	return { interaction: Option.some(make(sequence)), tracker: { ...tracker, sequence } }
}

/**
 * Release out of `Pressed`: noise, short, or a long press whose hold was never observed.
 */
const releaseFromPressed = (tracker: Tracker, thresholds: Thresholds, durationMs: number): Step => {
	const idle: Tracker = { ...tracker, state: 'Idle' }

	if (durationMs < thresholds.shortMinMs) return unchanged(idle)
	if (durationMs < thresholds.longThresholdMs) {
		return emit(idle, (sequence) => Interaction.ShortPress({ durationMs, sequence }))
	}
	return emit(idle, (sequence) => Interaction.LongPress({ durationMs, sequence }))
}

/**
 * Release out of `LongHeld`; below the threshold (a shortened instance threshold) it falls back to a short press.
 */
const releaseFromLongHeld = (tracker: Tracker, thresholds: Thresholds, durationMs: number): Step => {
	const idle: Tracker = { ...tracker, state: 'Idle' }

	if (durationMs >= thresholds.longThresholdMs) {
		return emit(idle, (sequence) => Interaction.LongPress({ durationMs, sequence }))
	}
	if (durationMs >= thresholds.shortMinMs) {
		return emit(idle, (sequence) => Interaction.ShortPress({ durationMs, sequence }))
	}
	return unchanged(idle)
}

export const Debounce = {
	/**
	 * A released input whose level last changed at `nowMs`
	 */
	initial: (nowMs: number): Tracker => ({
		lastChangeMs: nowMs,
		lastHoldTickMs: 0,
		lastLevel: 'released',
		pressStartMs: 0,
		sequence: 0,
		state: 'Idle',
	}),

	/**
	 * Feeds one sample; returns the next tracker and at most one interaction.
	 */
	step: (previous: Tracker, thresholds: Thresholds, sample: Sample): Step => {
		const { level, nowMs } = sample
		const tracker: Tracker =
			level === previous.lastLevel ? previous : { ...previous, lastChangeMs: nowMs, lastLevel: level }

		const stableForMs = nowMs - tracker.lastChangeMs
		const releaseDebounceMs = thresholds.releaseDebounceMs ?? thresholds.debounceMs
		const releasedStable = level === 'released' && stableForMs >= releaseDebounceMs

		switch (tracker.state) {
			case 'Idle':
				return level === 'pressed' && stableForMs >= thresholds.debounceMs
					? unchanged({ ...tracker, pressStartMs: tracker.lastChangeMs, state: 'Pressed' })
					: unchanged(tracker)

			case 'Pressed':
				if (releasedStable) {
					return releaseFromPressed(tracker, thresholds, tracker.lastChangeMs - tracker.pressStartMs)
				}
				return level === 'pressed' && nowMs - tracker.pressStartMs >= thresholds.longThresholdMs
					? unchanged({
							...tracker,
							lastHoldTickMs: tracker.pressStartMs + thresholds.longThresholdMs,
							state: 'LongHeld',
						})
					: unchanged(tracker)

			case 'LongHeld': {
				if (releasedStable) {
					return releaseFromLongHeld(tracker, thresholds, tracker.lastChangeMs - tracker.pressStartMs)
				}
				if (level === 'pressed' && nowMs - tracker.lastHoldTickMs >= thresholds.holdTickIntervalMs) {
					const lastHoldTickMs = tracker.lastHoldTickMs + thresholds.holdTickIntervalMs
					return emit({ ...tracker, lastHoldTickMs }, (sequence) =>
						Interaction.HoldTick({ durationMs: lastHoldTickMs - tracker.pressStartMs, sequence }),
					)
				}
				return unchanged(tracker)
			}
		}
	},

	/**
	 * Whether the tracker currently considers the input held
	 */
	isHeld: (tracker: Tracker): boolean => tracker.state !== 'Idle',
} as const
