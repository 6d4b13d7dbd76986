/**
 * Bus events the orchestrator reacts to, reduced to what it reads from them
 */

import { type Button, Lifecycle } from '@hearo/schemas/messages'
import { type DaemonId, RequiredDaemons } from '@hearo/schemas/shared'

import type { Signal } from '../domain/signal.domain.ts'

export const started = (daemon: DaemonId.Type): Signal.Type => ({ _tag: Lifecycle.Events.name.DaemonStarted[daemon] })

export const stopped = (daemon: DaemonId.Type): Signal.Type => ({ _tag: Lifecycle.Events.name.DaemonStopped[daemon] })

export const peersStarted: ReadonlyArray<Signal.Type> = RequiredDaemons.map(started)

export const wifiConnected: Signal.Type = { _tag: 'WSM_EVENT_WIFI_CONNECTED' }

export const wifiLost: Signal.Type = { _tag: 'WSM_EVENT_WIFI_LOST' }

export const wifiState = (to: string): Signal.Type => ({ _tag: 'WSM_EVENT_STATE_CHANGED', to })

export const authenticated: Signal.Type = { _tag: 'PLSM_EVENT_AUTHENTICATED' }

export const authLost: Signal.Type = { _tag: 'PLSM_EVENT_AUTH_LOST' }

export const tagAdded = (uid: string): Signal.Type => ({ _tag: 'NFC_EVENT_TAG_ADDED', uid })

export const tagRemoved: Signal.Type = { _tag: 'NFC_EVENT_TAG_REMOVED' }

export const tagResolved: Signal.Type = { _tag: 'PLSM_EVENT_TAG_RESOLVED' }

export const playStopped: Signal.Type = { _tag: 'PLSM_EVENT_PLAY_STOPPED' }

export const button = (name: string, interaction: typeof Button.Events.InteractionKind.Type): Signal.Type => ({
	_tag: 'BD_EVENT_BUTTON',
	button: name,
	interaction,
})

export const batteryCritical: Signal.Type = { _tag: 'POWD_EVENT_BATTERY_CRITICAL' }

/**
 * Peers up and the station online: the orchestrator is `Offline`, waiting for the player
 */
export const online: ReadonlyArray<Signal.Type> = [...peersStarted, wifiConnected]

/**
 * `online` plus an authenticated player: `ReadyPaused`
 */
export const ready: ReadonlyArray<Signal.Type> = [...online, authenticated]
