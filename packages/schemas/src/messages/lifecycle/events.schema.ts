/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
/**
 * Lifecycle events shared by every daemon
 *
 * The wire name carries the emitting daemon (`BD_EVENT_DAEMON_STARTED`, `NFC_EVENT_DAEMON_STARTED`, ...), so each
 * schema discriminates on a literal union of names rather than a single tag. Use the `name` tables to go from a
 * {@link DaemonId} to its wire name, and {@link daemonOf} for the opposite direction.
 */

import * as Array from 'effect/Array'
import type * as Option from 'effect/Option'
import * as Schema from 'effect/Schema'

import { DaemonId } from '../../shared/index.ts'

const DaemonIds = DaemonId.literals

export const DaemonStartedName = Schema.Literal(
	'BD_EVENT_DAEMON_STARTED',
	'HCSM_EVENT_DAEMON_STARTED',
	'LEDD_EVENT_DAEMON_STARTED',
	'NFC_EVENT_DAEMON_STARTED',
	'PLSM_EVENT_DAEMON_STARTED',
	'POWD_EVENT_DAEMON_STARTED',
	'WSM_EVENT_DAEMON_STARTED',
)

export const DaemonStoppedName = Schema.Literal(
	'BD_EVENT_DAEMON_STOPPED',
	'HCSM_EVENT_DAEMON_STOPPED',
	'LEDD_EVENT_DAEMON_STOPPED',
	'NFC_EVENT_DAEMON_STOPPED',
	'PLSM_EVENT_DAEMON_STOPPED',
	'POWD_EVENT_DAEMON_STOPPED',
	'WSM_EVENT_DAEMON_STOPPED',
)

export const DaemonErrorName = Schema.Literal(
	'BD_EVENT_ERROR',
	'HCSM_EVENT_ERROR',
	'LEDD_EVENT_ERROR',
	'NFC_EVENT_ERROR',
	'PLSM_EVENT_ERROR',
	'POWD_EVENT_ERROR',
	'WSM_EVENT_ERROR',
)

export const StateChangedName = Schema.Literal('HCSM_EVENT_STATE_CHANGED', 'PLSM_EVENT_STATE_CHANGED', 'WSM_EVENT_STATE_CHANGED')

/**
 * DaemonStarted - A daemon bound its command endpoint and is serving
 *
 * **Wire Format (DTO)**:
 *
 * ```json
 * { "version": "0.1.0", "pid": 4242 }
 * ```
 */
export const DaemonStarted = Schema.Struct({
	_tag: DaemonStartedName,
	pid: Schema.Int,
	version: Schema.String,
})

export declare namespace DaemonStarted {
	type Type = typeof DaemonStarted.Type
	type Dto = typeof DaemonStarted.Encoded
}

/**
 * DaemonStopped - Emitted from the daemon's shutdown path, before its endpoint is released
 */
export const DaemonStopped = Schema.Struct({
	_tag: DaemonStoppedName,
	pid: Schema.Int,
	reason: Schema.String,
})

export declare namespace DaemonStopped {
	type Type = typeof DaemonStopped.Type
	type Dto = typeof DaemonStopped.Encoded
}

/**
 * DaemonError - A classified failure surfaced as an event
 *
 * `recovering: true` means the daemon keeps running and retries on its own.
 */
export const DaemonError = Schema.Struct({
	_tag: DaemonErrorName,
	code: Schema.String,
	message: Schema.String,
	recovering: Schema.Boolean,
})

export declare namespace DaemonError {
	type Type = typeof DaemonError.Type
	type Dto = typeof DaemonError.Encoded
}

/**
 * StateChanged - A state machine moved between two states
 *
 * **Wire format**: `{ "old": "Offline", "new": "ReadyPaused" }`
 */
export const StateChanged = Schema.Struct({
	_tag: StateChangedName,
	from: Schema.propertySignature(Schema.String).pipe(Schema.fromKey('old')),
	to: Schema.propertySignature(Schema.String).pipe(Schema.fromKey('new')),
})

export declare namespace StateChanged {
	type Type = typeof StateChanged.Type
	type Dto = typeof StateChanged.Encoded
}

export const name = {
	DaemonError: {
		bd: 'BD_EVENT_ERROR',
		hcsm: 'HCSM_EVENT_ERROR',
		ledd: 'LEDD_EVENT_ERROR',
		nfcd: 'NFC_EVENT_ERROR',
		plsm: 'PLSM_EVENT_ERROR',
		powd: 'POWD_EVENT_ERROR',
		wsm: 'WSM_EVENT_ERROR',
	},
	DaemonStarted: {
		bd: 'BD_EVENT_DAEMON_STARTED',
		hcsm: 'HCSM_EVENT_DAEMON_STARTED',
		ledd: 'LEDD_EVENT_DAEMON_STARTED',
		nfcd: 'NFC_EVENT_DAEMON_STARTED',
		plsm: 'PLSM_EVENT_DAEMON_STARTED',
		powd: 'POWD_EVENT_DAEMON_STARTED',
		wsm: 'WSM_EVENT_DAEMON_STARTED',
	},
	DaemonStopped: {
		bd: 'BD_EVENT_DAEMON_STOPPED',
		hcsm: 'HCSM_EVENT_DAEMON_STOPPED',
		ledd: 'LEDD_EVENT_DAEMON_STOPPED',
		nfcd: 'NFC_EVENT_DAEMON_STOPPED',
		plsm: 'PLSM_EVENT_DAEMON_STOPPED',
		powd: 'POWD_EVENT_DAEMON_STOPPED',
		wsm: 'WSM_EVENT_DAEMON_STOPPED',
	},
} as const satisfies {
	DaemonError: Record<DaemonId.Type, DaemonError.Type['_tag']>
	DaemonStarted: Record<DaemonId.Type, DaemonStarted.Type['_tag']>
	DaemonStopped: Record<DaemonId.Type, DaemonStopped.Type['_tag']>
}

/**
 * Resolves the daemon that emitted a lifecycle event from its wire name.
 *
 * @example
 *
 * ```typescript
 * daemonOf('PLSM_EVENT_DAEMON_STARTED') // Option.some('plsm')
 * ```
 */
export const daemonOf = (eventName: string): Option.Option<DaemonId.Type> =>
	Array.findFirst(
		DaemonIds,
		(daemon) =>
			name.DaemonStarted[daemon] === eventName ||
			name.DaemonStopped[daemon] === eventName ||
			name.DaemonError[daemon] === eventName,
	)
