/**
 * Handlers for the commands every daemon answers (`*_CMD_PING`, `*_CMD_SET_DEBUG`)
 */

import * as Effect from 'effect/Effect'

import type { Payload } from '@hearo/schemas/envelope'

import type { CommandRejected } from '../errors.ts'
import { LogThreshold } from '../logging/logging.ts'
import type { Accepted } from './command-responder.ts'
import { DaemonContext } from './daemon-context.ts'
import { DaemonIdentity } from './daemon-identity.ts'

/**
 * Answers a ping with the daemon's identity, uptime and its own `diagnostics`.
 *
 * **Result payload**: `{ status: "ok", daemon, version, pid, uptime_ms, ...diagnostics }`
 */
export const ping = <R = never>(
	diagnostics: Effect.Effect<Payload.Type, never, R> = Effect.succeed({}),
): Effect.Effect<Accepted<R | DaemonIdentity | DaemonContext>> =>
	Effect.succeed(
		Effect.gen(function* () {
			const identity = yield* DaemonIdentity
			const context = yield* DaemonContext
			const extra = yield* diagnostics

			return {
				...extra,
				daemon: identity.id,
				pid: identity.pid,
				status: 'ok',
				uptime_ms: yield* context.uptimeMs,
				version: identity.version,
			}
		}),
	)

/**
 * Changes the log threshold; an unsupported level is rejected with `INVALID_LEVEL`.
 *
 * **Result payload**: `{ level: "debug" }`
 */
export const setDebug = (level: string): Effect.Effect<Accepted, CommandRejected, LogThreshold> =>
	LogThreshold.pipe(
		Effect.flatMap((threshold) => threshold.set(level)),
		Effect.as(Effect.succeed({ level: level.trim().toLowerCase() })),
	)
