import * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'

import { PeerUnavailable } from './peer-errors.ts'

/**
 * Bounds a collaborator call by `timeout`; a call that does not finish in time fails as a transient
 * {@link PeerUnavailable} with code `TIMEOUT`.
 *
 * @example
 *
 * ```typescript
 * const status = yield* stack.stationStatus.pipe(bounded('stationStatus', '3 seconds'))
 * ```
 */
export const bounded =
	(operation: string, timeout: Duration.DurationInput) =>
	<A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E | PeerUnavailable, R> =>
		self.pipe(
			Effect.timeoutFail({
				duration: timeout,
				onTimeout: () =>
					new PeerUnavailable({
						code: 'TIMEOUT',
						kind: 'transient',
						message: `${operation} timed out after ${Duration.format(Duration.decode(timeout))}`,
					}),
			}),
			Effect.withSpan(`Collaborator.${operation}`),
		)
