import * as Context from 'effect/Context'
import type * as Effect from 'effect/Effect'

import type { CollaboratorError } from '@hearo/platform'

export interface PlaybackStatus {
	readonly isPlaying: boolean
	readonly uri: string | null
	readonly positionMs: number
}

/**
 * PlaybackBackendPort - Remote playback service driving the speaker device
 *
 * Rejected credentials fail with `AuthIssue`; a missing device or unreachable service with `PeerUnavailable`.
 */
export class PlaybackBackendPort extends Context.Tag('@hearo/player/ports/PlaybackBackendPort')<
	PlaybackBackendPort,
	{
		/** Refreshes the session and finds the playback device */
		readonly ensureReady: Effect.Effect<void, CollaboratorError>
		readonly play: (uri: string, positionMs: number) => Effect.Effect<void, CollaboratorError>
		readonly stop: Effect.Effect<void, CollaboratorError>
		readonly next: Effect.Effect<void, CollaboratorError>
		readonly previous: Effect.Effect<void, CollaboratorError>
		readonly seekTo: (positionMs: number) => Effect.Effect<void, CollaboratorError>
		readonly status: Effect.Effect<PlaybackStatus, CollaboratorError>
	}
>() {}
