/**
 * Commands every daemon answers
 *
 * Each daemon accepts its own `<PREFIX>_CMD_PING` and `<PREFIX>_CMD_SET_DEBUG`; the builders below produce the schema
 * for a given wire name so the daemon's command union can include them.
 */

import * as Schema from 'effect/Schema'

/**
 * Ping - liveness probe, answered with `{ status, daemon, version, pid, uptime_ms, ... }`
 */
export const Ping = <const Name extends string>(name: Name) => Schema.TaggedStruct(name, {})

/**
 * SetDebug - changes the daemon's log threshold at runtime
 *
 * Accepted levels: `none`, `error`, `warn`, `warning`, `info`, `debug`. Anything else is rejected with
 * `INVALID_LEVEL`.
 */
export const SetDebug = <const Name extends string>(name: Name) =>
	Schema.TaggedStruct(name, {
		level: Schema.String,
	})
