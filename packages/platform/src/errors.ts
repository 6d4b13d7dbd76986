/**
 * Error taxonomy of the coordination layer
 *
 * None of these escape a daemon's tick or command loop. Protocol and transport errors are logged and the message is
 * dropped; peer failures are classified (see `peer/`) and surface as events; command errors become acks and results.
 * Only {@link FatalInit} ends a process.
 */

import * as Schema from 'effect/Schema'

export { TransportError } from './ports/endpoint.port.ts'

/**
 * A frame or envelope could not be understood
 */
export class ProtocolError extends Schema.TaggedError<ProtocolError>()('ProtocolError', {
	endpoint: Schema.String,
	message: Schema.String,
}) {}

/**
 * A required resource could not be acquired at startup; the daemon exits with a failure code
 */
export class FatalInit extends Schema.TaggedError<FatalInit>()('FatalInit', {
	cause: Schema.optional(Schema.Defect),
	message: Schema.String,
	resource: Schema.String,
}) {}

/**
 * The command was not accepted; answered with `ack ok=false` and no result
 */
export class CommandRejected extends Schema.TaggedError<CommandRejected>()('CommandRejected', {
	code: Schema.String,
	message: Schema.String,
}) {}

/**
 * The command was accepted but failed; answered with `ack ok=true` followed by `result ok=false`
 */
export class CommandFailed extends Schema.TaggedError<CommandFailed>()('CommandFailed', {
	code: Schema.String,
	message: Schema.String,
}) {}
