import * as Context from 'effect/Context'
import * as Layer from 'effect/Layer'

import type { DaemonId } from '@hearo/schemas/shared'

/**
 * Version reported in `DAEMON_STARTED` and `PING`
 */
export const VERSION = '0.1.0'

/**
 * DaemonIdentity - Who the current process is on the bus
 *
 * Used as envelope origin (`evt-<id>-<n>`), to name the command endpoint and to select lifecycle wire names.
 */
export class DaemonIdentity extends Context.Tag('@hearo/platform/daemon/DaemonIdentity')<
	DaemonIdentity,
	{
		readonly id: DaemonId.Type
		readonly pid: number
		readonly version: string
	}
>() {
	static readonly layer = (id: DaemonId.Type): Layer.Layer<DaemonIdentity> =>
		Layer.succeed(DaemonIdentity, { id, pid: process.pid, version: VERSION })
}
