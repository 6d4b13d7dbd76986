/**
 * DaemonId - Identity of a daemon on the bus
 *
 * Each daemon owns the command endpoint of the same name and prefixes its wire names with {@link DaemonPrefix}.
 */

import * as Schema from 'effect/Schema'

export const DaemonId = Schema.Literal('bd', 'nfcd', 'ledd', 'wsm', 'plsm', 'powd', 'hcsm')

export declare namespace DaemonId {
	type Type = typeof DaemonId.Type
}

/**
 * Wire name prefix per daemon (`NFC_EVENT_TAG_ADDED`, `BD_CMD_PING`, ...)
 */
export const DaemonPrefix = {
	bd: 'BD',
	hcsm: 'HCSM',
	ledd: 'LEDD',
	nfcd: 'NFC',
	plsm: 'PLSM',
	powd: 'POWD',
	wsm: 'WSM',
} as const satisfies Record<DaemonId.Type, string>

/**
 * Peers whose start the orchestrator waits for before leaving `Initializing`
 */
export const RequiredDaemons: ReadonlyArray<DaemonId.Type> = ['nfcd', 'bd', 'ledd', 'wsm', 'plsm', 'powd']
