/**
 * Backoff - Exponential retry schedule of a peer state machine
 *
 * Pure value object. A peer checks {@link Backoff.isDue} on each tick, calls {@link Backoff.advance} after an
 * attempt, and {@link Backoff.reset} once it reaches a stable state. The delay doubles per attempt and is capped at
 * `maxMs`.
 *
 * @example
 *
 * ```typescript
 * let backoff = Backoff.make({ initialMs: 5000, maxMs: 60000 }, now)
 * if (Backoff.isDue(backoff, now)) {
 * 	yield* retry
 * 	backoff = Backoff.advance(backoff, now) // next attempt at now + 5000, then + 10000, ...
 * }
 * ```
 */

export interface BackoffPolicy {
	readonly initialMs: number
	readonly maxMs: number
}

export interface Backoff extends BackoffPolicy {
	/** Delay applied by the next {@link Backoff.advance} */
	readonly delayMs: number
	/** Epoch millis before which no attempt is due */
	readonly nextAttemptAtMs: number
}

export const Backoff = {
	/**
	 * Delays the next attempt by the current delay and doubles it for the one after.
	 */
	advance: (backoff: Backoff, nowMs: number): Backoff => ({
		...backoff,
		delayMs: Math.min(backoff.delayMs * 2, backoff.maxMs),
		nextAttemptAtMs: nowMs + backoff.delayMs,
	}),

	isDue: (backoff: Backoff, nowMs: number): boolean => nowMs >= backoff.nextAttemptAtMs,

	/**
	 * A fresh schedule whose first attempt is due immediately.
	 */
	make: (policy: BackoffPolicy, nowMs: number): Backoff => ({
		delayMs: Math.min(policy.initialMs, policy.maxMs),
		initialMs: policy.initialMs,
		maxMs: policy.maxMs,
		nextAttemptAtMs: nowMs,
	}),

	reset: (backoff: Backoff, nowMs: number): Backoff => Backoff.make(backoff, nowMs),
} as const
