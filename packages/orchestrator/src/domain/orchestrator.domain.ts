/**
 * Central orchestrator state machine
 *
 * `Orchestrator.step` folds one bus event into the system state and returns the directives the daemon carries out:
 * commands to send (never awaited) and events to emit. Unlisted events leave the state as it is.
 *
 * ```
 * Initializing --all peers started, network status seen--> NoNetwork <--wifi lost-- Offline / ReadyPaused
 * NoNetwork --wifi connected--> Offline --authenticated--> ReadyPaused --tag resolved--> Playing
 * Playing --play stopped / tag removed--> ReadyPaused
 * any operating state --battery critical--> ShuttingDown
 * any operating state --required peer stopped--> Faulted --all peers started again--> Initializing
 * Playing --required peer other than the player stopped--> Faulted, telling the player to stop
 * ```
 */

import * as Data from 'effect/Data'
import * as Option from 'effect/Option'
import * as Schema from 'effect/Schema'

import { type DomainEvent, Lifecycle, Orchestrator as Messages, Player } from '@hearo/schemas/messages'
import { type DaemonId, RequiredDaemons } from '@hearo/schemas/shared'

import type { ButtonPressed, Signal } from './signal.domain.ts'

export type SystemState =
	| 'Initializing'
	| 'NoNetwork'
	| 'Offline'
	| 'ReadyPaused'
	| 'Playing'
	| 'ShuttingDown'
	| 'Faulted'

export type Directive = Data.TaggedEnum<{
	SendCommand: { readonly to: DaemonId.Type; readonly command: Player.Commands.Commands.Type }
	Emit: { readonly event: DomainEvent.Type }
}>

export const Directive = Data.taggedEnum<Directive>()

export interface Orchestrator {
	readonly state: SystemState
	/** Required peers seen started and not stopped since */
	readonly started: ReadonlyArray<DaemonId.Type>
	/** A Wi-Fi status has been reported */
	readonly networkSeen: boolean
	/** The last Wi-Fi status said the station is up */
	readonly linkConnected: boolean
	/** `HCSM_EVENT_INITIATED` went out */
	readonly initiated: boolean
}

/** Relative jump of a long press or hold on NEXT / PREV */
export const SEEK_STEP_MS = 15000

const operating: ReadonlyArray<SystemState> = ['NoNetwork', 'Offline', 'ReadyPaused', 'Playing']

const isDaemonStarted = Schema.is(Lifecycle.Events.DaemonStartedName)
const isDaemonStopped = Schema.is(Lifecycle.Events.DaemonStoppedName)

export interface Outcome {
	readonly orchestrator: Orchestrator
	readonly directives: ReadonlyArray<Directive>
}

const toPlayer = (command: Player.Commands.Commands.Type): Directive =>
	Directive.SendCommand({ command, to: 'plsm' })

const allStarted = (orchestrator: Orchestrator): boolean =>
	RequiredDaemons.every((daemon) => orchestrator.started.includes(daemon))

/**
 * Moves to `to`, announcing the change; entering `ShuttingDown` also announces the shutdown.
 */
const enter = (outcome: Outcome, to: SystemState): Outcome => {
	const from = outcome.orchestrator.state
	if (from === to) return outcome

	const announced: Array<Directive> = [Directive.Emit({ event: { _tag: 'HCSM_EVENT_STATE_CHANGED', from, to } })]
	if (to === 'ShuttingDown') {
		announced.push(Directive.Emit({ event: new Messages.Events.SystemShutdown({ reason: 'battery_critical' }) }))
	}

	return {
		directives: [...outcome.directives, ...announced],
		orchestrator: { ...outcome.orchestrator, state: to },
	}
}

const send = (outcome: Outcome, command: Player.Commands.Commands.Type): Outcome => ({
	...outcome,
	directives: [...outcome.directives, toPlayer(command)],
})

/**
 * Updates what is known about peers and the network, whatever the state.
 */
const observe = (orchestrator: Orchestrator, event: Signal.Type): Orchestrator => {
	if (isDaemonStarted(event._tag) || isDaemonStopped(event._tag)) {
		const daemon = Lifecycle.Events.daemonOf(event._tag).pipe(Option.filter((id) => RequiredDaemons.includes(id)))
		if (Option.isNone(daemon)) return orchestrator

		const others = orchestrator.started.filter((id) => id !== daemon.value)
		return { ...orchestrator, started: isDaemonStarted(event._tag) ? [...others, daemon.value] : others }
	}

	switch (event._tag) {
		case 'WSM_EVENT_WIFI_CONNECTED':
			return { ...orchestrator, linkConnected: true, networkSeen: true }
		case 'WSM_EVENT_WIFI_LOST':
			return { ...orchestrator, linkConnected: false, networkSeen: true }
		case 'WSM_EVENT_STATE_CHANGED':
			return { ...orchestrator, linkConnected: event.to === 'Connected', networkSeen: true }
		default:
			return orchestrator
	}
}

const onButton = (outcome: Outcome, event: typeof ButtonPressed.Type): Outcome => {
	if (event.button !== 'NEXT' && event.button !== 'PREV') return outcome

	if (event.interaction === 'SHORT_PRESS') {
		return send(outcome, event.button === 'NEXT' ? new Player.Commands.Next() : new Player.Commands.Previous())
	}
	return send(outcome, new Player.Commands.Seek({ deltaMs: event.button === 'NEXT' ? SEEK_STEP_MS : -SEEK_STEP_MS }))
}

const playTag = (outcome: Outcome, uid: string): Outcome => send(outcome, new Player.Commands.PlayTag({ uid }))

/**
 * Transitions of the operating states, per the table of events each one reacts to.
 */
const react = (outcome: Outcome, event: Signal.Type): Outcome => {
	const { state } = outcome.orchestrator

	if (event._tag === 'POWD_EVENT_BATTERY_CRITICAL' && operating.includes(state)) {
		return enter(send(outcome, new Player.Commands.Stop()), 'ShuttingDown')
	}

	switch (state) {
		case 'NoNetwork':
			return event._tag === 'WSM_EVENT_WIFI_CONNECTED' ? enter(outcome, 'Offline') : outcome

		case 'Offline':
			switch (event._tag) {
				case 'PLSM_EVENT_AUTHENTICATED':
					return enter(outcome, 'ReadyPaused')
				case 'WSM_EVENT_WIFI_LOST':
					return enter(outcome, 'NoNetwork')
				default:
					return outcome
			}

		case 'ReadyPaused':
			switch (event._tag) {
				case 'NFC_EVENT_TAG_ADDED':
					return playTag(outcome, event.uid)
				case 'PLSM_EVENT_TAG_RESOLVED':
					return enter(outcome, 'Playing')
				case 'WSM_EVENT_WIFI_LOST':
					return enter(outcome, 'NoNetwork')
				case 'PLSM_EVENT_AUTH_LOST':
				case 'PLSM_EVENT_AUTH_FAILED':
				case 'PLSM_EVENT_DISCONNECTED':
					return enter(outcome, 'Offline')
				default:
					return outcome
			}

		case 'Playing':
			switch (event._tag) {
				case 'NFC_EVENT_TAG_ADDED':
					return playTag(outcome, event.uid)
				case 'PLSM_EVENT_PLAY_STOPPED':
					return enter(outcome, 'ReadyPaused')
				case 'NFC_EVENT_TAG_REMOVED':
					return enter(send(outcome, new Player.Commands.Stop()), 'ReadyPaused')
				case 'BD_EVENT_BUTTON':
					return onButton(outcome, event)
				case 'WSM_EVENT_WIFI_LOST':
					return enter(send(outcome, new Player.Commands.Stop()), 'NoNetwork')
				case 'PLSM_EVENT_DISCONNECTED':
				case 'PLSM_EVENT_AUTH_LOST':
				case 'PLSM_EVENT_AUTH_FAILED':
					return enter(outcome, 'Offline')
				default:
					return outcome
			}

		default:
			return outcome
	}
}

/**
 * Follows the transitions that need no further event: leaving `Initializing` once peers and network are known
 * (straight on to `Offline` when the link is already up), and leaving `Faulted` once every peer is back.
 */
const settle = (outcome: Outcome): Outcome => {
	const { orchestrator } = outcome

	if (orchestrator.state === 'Faulted' && allStarted(orchestrator)) {
		return settle(enter(outcome, 'Initializing'))
	}

	if (orchestrator.state !== 'Initializing' || !allStarted(orchestrator) || !orchestrator.networkSeen) {
		return outcome
	}

	const noNetwork = enter(outcome, 'NoNetwork')
	const initiated: Outcome = orchestrator.initiated
		? noNetwork
		: {
				directives: [...noNetwork.directives, Directive.Emit({ event: new Messages.Events.Initiated() })],
				orchestrator: { ...noNetwork.orchestrator, initiated: true },
			}

	return orchestrator.linkConnected ? enter(initiated, 'Offline') : initiated
}

const initial: Orchestrator = {
	initiated: false,
	linkConnected: false,
	networkSeen: false,
	started: [],
	state: 'Initializing',
}

export const Orchestrator = {
	initial,

	step: (orchestrator: Orchestrator, event: Signal.Type): Outcome => {
		if (orchestrator.state === 'ShuttingDown') {
			return { directives: [], orchestrator }
		}

		const observed: Outcome = { directives: [], orchestrator: observe(orchestrator, event) }

		const lostPeer = isDaemonStopped(event._tag)
			? Lifecycle.Events.daemonOf(event._tag).pipe(Option.filter((id) => RequiredDaemons.includes(id)))
			: Option.none()

		if (Option.isNone(lostPeer) || !operating.includes(orchestrator.state)) {
			return settle(react(observed, event))
		}

		// A player that is still up is told to stop; one that went away has nothing to stop
		const halted =
			orchestrator.state === 'Playing' && lostPeer.value !== 'plsm'
				? send(observed, new Player.Commands.Stop())
				: observed

		return settle(enter(halted, 'Faulted'))
	},
} as const
