/**
 * Classified collaborator failures
 *
 * A peer converts every failure of its external collaborator (shell command, HTTP API, hardware read) into one of
 * these before it leaves the collaborator port, and turns them into events inside its tick.
 */

import * as Schema from 'effect/Schema'

/**
 * The collaborator could not be reached or did not answer in time
 *
 * - `transient` - worth retrying as is (timeout, flaky link)
 * - `resource-unavailable` - a required resource is gone (no device, no network tool); retried with backoff
 */
export class PeerUnavailable extends Schema.TaggedError<PeerUnavailable>()('PeerUnavailable', {
	code: Schema.String,
	kind: Schema.Literal('transient', 'resource-unavailable'),
	message: Schema.String,
}) {}

/**
 * Credentials or session are invalid; distinct from unavailability so the orchestrator can pick `Offline`
 */
export class AuthIssue extends Schema.TaggedError<AuthIssue>()('AuthIssue', {
	code: Schema.String,
	message: Schema.String,
}) {}

export type CollaboratorError = PeerUnavailable | AuthIssue
