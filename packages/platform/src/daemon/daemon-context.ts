import * as Context from 'effect/Context'
import type * as Effect from 'effect/Effect'

/**
 * DaemonContext - Facilities the daemon loop offers to tick and command handlers
 */
export class DaemonContext extends Context.Tag('@hearo/platform/daemon/DaemonContext')<
	DaemonContext,
	{
		/** Milliseconds since the daemon started serving */
		readonly uptimeMs: Effect.Effect<number>

		/**
		 * Ends the loop after the current item; the stopped event carries `reason`.
		 */
		readonly requestShutdown: (reason: string) => Effect.Effect<void>
	}
>() {}
