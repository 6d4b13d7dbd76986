/**
 * Endpoint Port - Named, process-owned receive addresses on the local bus
 *
 * An endpoint is bound by exactly one process for that process' lifetime. Delivery is best effort:
 *
 * - `send` either hands the frame to the transport or fails with a {@link TransportError}; it never waits for the
 *   receiver to process it
 * - frames are not persisted; a frame sent to an unbound endpoint is lost
 * - there is no ordering across endpoints; a single sender to a single receiver is delivered in send order on a
 *   best-effort basis
 *
 * Frames are opaque strings here; envelope encoding lives in {@link MessageBus}.
 */

import * as Context from 'effect/Context'
import type * as Effect from 'effect/Effect'
import * as Schema from 'effect/Schema'
import type * as Scope from 'effect/Scope'
import type * as Stream from 'effect/Stream'

import type { EndpointName } from '@hearo/schemas/shared'

/**
 * Binding or sending failed at the transport level
 *
 * A failed `send` means the frame is lost. A failed `bind` at startup is fatal for the daemon.
 */
export class TransportError extends Schema.TaggedError<TransportError>()('TransportError', {
	cause: Schema.optional(Schema.Defect),
	endpoint: Schema.String,
	message: Schema.String,
	operation: Schema.Literal('bind', 'send'),
}) {}

export class EndpointPort extends Context.Tag('@hearo/platform/ports/EndpointPort')<
	EndpointPort,
	{
		/**
		 * Binds `name` for the lifetime of the current scope and returns the frames it receives.
		 *
		 * Binding is idempotent: a stale binding of the same name left by a dead process is reclaimed first. Closing the
		 * scope releases the endpoint and ends the stream.
		 */
		readonly bind: (name: EndpointName.Type) => Effect.Effect<Stream.Stream<string>, TransportError, Scope.Scope>

		/**
		 * Sends one frame to `name`.
		 */
		readonly send: (name: EndpointName.Type, frame: string) => Effect.Effect<void, TransportError>
	}
>() {}
