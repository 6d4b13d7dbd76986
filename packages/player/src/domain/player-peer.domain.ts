/**
 * Player peer state
 *
 * What the peer knows about the playback session and its authentication, and the pure rules it plays by: where a
 * tag starts, where a seek lands and which events a backend failure is announced with.
 */

import * as Option from 'effect/Option'

import { Backoff, type BackoffPolicy, type CollaboratorError } from '@hearo/platform'
import type { Payload } from '@hearo/schemas/envelope'
import { Player } from '@hearo/schemas/messages'

import type { TagRecord } from '../ports/tag-store.port.ts'

export type PlayerState = 'Init' | 'Authenticating' | 'Ready' | 'Playing' | 'Error'

export type AuthState = 'None' | 'Pending' | 'Ok' | 'Failed' | 'Lost'

/**
 * Backend call a failure came from; startup failures are reported with their own reasons
 */
export type Operation = 'startup' | 'play' | 'stop' | 'status' | 'next' | 'previous' | 'seek'

export interface Session {
	/** Tag the session was started from; `null` for an explicit `PLAY` */
	readonly uid: string | null
	readonly uri: string
	/** Last position seen */
	readonly positionMs: number
}

export interface PlayerPeer {
	readonly state: PlayerState
	readonly auth: AuthState
	readonly backoff: Backoff
	readonly session: Option.Option<Session>
	readonly lastSavedAtMs: number
	readonly lastErrorCode: string | null
}

export type FailureEvent =
	| Player.Events.AuthFailed
	| Player.Events.AuthLost
	| Player.Events.Disconnected
	| Player.Events.PlaybackError

export const PlayerPeer = {
	initial: (policy: BackoffPolicy, nowMs: number): PlayerPeer => ({
		auth: 'None',
		backoff: Backoff.make(policy, nowMs),
		lastErrorCode: null,
		lastSavedAtMs: nowMs,
		session: Option.none(),
		state: 'Init',
	}),

	/**
	 * Resume the last track at its last position when there is one, otherwise the playlist from the start.
	 */
	resolveStart: (record: TagRecord.Type): { readonly uri: string; readonly positionMs: number } =>
		record.lastTrackUri !== '' && record.lastPosMs > 0
			? { positionMs: record.lastPosMs, uri: record.lastTrackUri }
			: { positionMs: 0, uri: record.playlistUri },

	seekTarget: (positionMs: number, deltaMs: number): number => Math.max(0, positionMs + deltaMs),

	/**
	 * Failures the peer cannot wait out in place (rejected credentials, a missing device)
	 */
	isFatal: (error: CollaboratorError): boolean => error._tag === 'AuthIssue' || error.kind === 'resource-unavailable',

	/**
	 * Events announcing `error`, in publish order, and the auth state it leaves behind.
	 *
	 * - `AuthIssue`: `AUTH_FAILED` at startup, `AUTH_LOST` afterwards
	 * - resource-unavailable: `DISCONNECTED` then `AUTH_LOST`
	 * - `PLAYBACK_ERROR` always follows, except for non-transient startup failures
	 *
	 * `AUTH_FAILED` and `AUTH_LOST` are only announced when the auth state changes.
	 */
	failure: (
		auth: AuthState,
		error: CollaboratorError,
		operation: Operation,
	): { readonly auth: AuthState; readonly events: ReadonlyArray<FailureEvent> } => {
		const events: Array<FailureEvent> = []
		let next = auth

		if (error._tag === 'AuthIssue') {
			if (operation === 'startup') {
				if (auth !== 'Failed') events.push(new Player.Events.AuthFailed({ reason: `startup_auth_failed:${error.code}` }))
				next = 'Failed'
			} else {
				if (auth !== 'Lost') events.push(new Player.Events.AuthLost({ reason: `${operation}_auth_issue:${error.code}` }))
				next = 'Lost'
			}
		} else if (error.kind === 'resource-unavailable') {
			const reason = operation === 'startup' ? `device_unavailable:${error.code}` : `device_issue:${error.code}`
			events.push(new Player.Events.Disconnected({ reason }))
			if (auth !== 'Lost') events.push(new Player.Events.AuthLost({ reason }))
			next = 'Lost'
		}

		if (operation !== 'startup' || !PlayerPeer.isFatal(error)) {
			events.push(new Player.Events.PlaybackError({ code: error.code, message: error.message }))
		}

		return { auth: next, events }
	},

	/**
	 * Result payload of `PLSM_COMMAND_STATUS`.
	 */
	status: (peer: PlayerPeer, uptimeMs: number): Payload.Type => ({
		auth: peer.auth,
		last_error_code: peer.lastErrorCode,
		session: Option.match(peer.session, {
			onNone: () => null,
			onSome: (session) => ({ position_ms: session.positionMs, uid: session.uid, uri: session.uri }),
		}),
		state: peer.state,
		uptime_ms: uptimeMs,
	}),
} as const
