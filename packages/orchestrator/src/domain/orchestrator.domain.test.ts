import { describe, expect, it } from '@effect/vitest'

import { Orchestrator as Messages, Player } from '@hearo/schemas/messages'

import {
	authenticated,
	authLost,
	batteryCritical,
	button,
	online,
	peersStarted,
	playStopped,
	ready,
	started,
	stopped,
	tagAdded,
	tagRemoved,
	tagResolved,
	wifiConnected,
	wifiLost,
	wifiState,
} from '../test/bus-events.fixture.ts'
import { Directive, Orchestrator, type SystemState } from './orchestrator.domain.ts'
import type { Signal } from './signal.domain.ts'

/**
 * Folds `events` from `from`, collecting every directive on the way.
 */
const run = (events: ReadonlyArray<Signal.Type>, from: Orchestrator = Orchestrator.initial) =>
	events.reduce(
		(acc, event) => {
			const { directives, orchestrator } = Orchestrator.step(acc.orchestrator, event)
			return { directives: [...acc.directives, ...directives], orchestrator }
		},
		{ directives: new Array<Directive>(), orchestrator: from },
	)

const changed = (from: SystemState, to: SystemState) =>
	Directive.Emit({ event: { _tag: 'HCSM_EVENT_STATE_CHANGED', from, to } })

const toPlayer = (command: Player.Commands.Commands.Type) => Directive.SendCommand({ command, to: 'plsm' })

const playing = run([...ready, tagAdded('04AA'), tagResolved]).orchestrator

describe('Orchestrator.step', () => {
	describe('leaving Initializing', () => {
		it('waits for every required peer and a network status', () => {
			const { directives, orchestrator } = run(peersStarted)

			expect(orchestrator.state).toBe('Initializing')
			expect(directives).toEqual([])
		})

		it('moves to NoNetwork and announces INITIATED', () => {
			/**
			 * GIVEN every required peer started
			 * WHEN the Wi-Fi peer reports the link lost
			 * THEN the orchestrator moves to NoNetwork and announces INITIATED
			 */
			const { directives, orchestrator } = run([...peersStarted, wifiLost])

			expect(orchestrator.state).toBe('NoNetwork')
			expect(directives).toEqual([
				changed('Initializing', 'NoNetwork'),
				Directive.Emit({ event: new Messages.Events.Initiated() }),
			])
		})

		it('continues to Offline when the link is already up', () => {
			const { directives, orchestrator } = run(online)

			expect(orchestrator.state).toBe('Offline')
			expect(directives).toEqual([
				changed('Initializing', 'NoNetwork'),
				Directive.Emit({ event: new Messages.Events.Initiated() }),
				changed('NoNetwork', 'Offline'),
			])
		})

		it('takes a Wi-Fi state change as network status', () => {
			const { orchestrator } = run([...peersStarted, wifiState('AccessPoint')])

			expect(orchestrator.state).toBe('NoNetwork')
		})

		it('ignores tags and buttons', () => {
			const { directives, orchestrator } = run([tagAdded('04AA'), button('NEXT', 'SHORT_PRESS'), batteryCritical])

			expect(orchestrator.state).toBe('Initializing')
			expect(directives).toEqual([])
		})
	})

	it('announces INITIATED once per lifetime', () => {
		/**
		 * GIVEN an initiated orchestrator
		 * WHEN a required peer stops and starts again
		 * THEN it goes through Faulted and Initializing back to NoNetwork without a second INITIATED
		 */
		const { directives, orchestrator } = run([...peersStarted, wifiLost, stopped('bd'), started('bd')])

		expect(orchestrator.state).toBe('NoNetwork')
		expect(directives).toEqual([
			changed('Initializing', 'NoNetwork'),
			Directive.Emit({ event: new Messages.Events.Initiated() }),
			changed('NoNetwork', 'Faulted'),
			changed('Faulted', 'Initializing'),
			changed('Initializing', 'NoNetwork'),
		])
	})

	it('does not fault when a peer that is not required stops', () => {
		const { directives } = run([stopped('hcsm')], run(online).orchestrator)

		expect(directives).toEqual([])
	})

	it('follows the network and the player to ReadyPaused and back', () => {
		const { directives, orchestrator } = run([...ready, authLost, wifiLost, wifiConnected])

		expect(orchestrator.state).toBe('Offline')
		expect(directives.slice(3)).toEqual([
			changed('Offline', 'ReadyPaused'),
			changed('ReadyPaused', 'Offline'),
			changed('Offline', 'NoNetwork'),
			changed('NoNetwork', 'Offline'),
		])
	})

	describe('tags', () => {
		it('asks the player to play an added tag and waits for it to resolve', () => {
			const fromReady = run(ready).orchestrator

			const added = run([tagAdded('04AA')], fromReady)
			expect(added.orchestrator.state).toBe('ReadyPaused')
			expect(added.directives).toEqual([toPlayer(new Player.Commands.PlayTag({ uid: '04AA' }))])

			const resolved = run([tagResolved], added.orchestrator)
			expect(resolved.orchestrator.state).toBe('Playing')
			expect(resolved.directives).toEqual([changed('ReadyPaused', 'Playing')])
		})

		it('stops playback when the tag is taken away', () => {
			const { directives, orchestrator } = run([tagRemoved], playing)

			expect(orchestrator.state).toBe('ReadyPaused')
			expect(directives).toEqual([toPlayer(new Player.Commands.Stop()), changed('Playing', 'ReadyPaused')])
		})

		it('swaps to another tag while playing', () => {
			const { directives, orchestrator } = run([tagAdded('04BB')], playing)

			expect(orchestrator.state).toBe('Playing')
			expect(directives).toEqual([toPlayer(new Player.Commands.PlayTag({ uid: '04BB' }))])
		})

		it('returns to ReadyPaused when the player stops on its own', () => {
			expect(run([playStopped], playing).orchestrator.state).toBe('ReadyPaused')
		})
	})

	describe('buttons while playing', () => {
		it.each([
			{ command: new Player.Commands.Next(), interaction: 'SHORT_PRESS', name: 'NEXT' },
			{ command: new Player.Commands.Previous(), interaction: 'SHORT_PRESS', name: 'PREV' },
			{ command: new Player.Commands.Seek({ deltaMs: 15000 }), interaction: 'LONG_PRESS', name: 'NEXT' },
			{ command: new Player.Commands.Seek({ deltaMs: -15000 }), interaction: 'HOLD_TICK', name: 'PREV' },
		] as const)('$name $interaction sends $command._tag', ({ command, interaction, name }) => {
			const { directives, orchestrator } = run([button(name, interaction)], playing)

			expect(orchestrator.state).toBe('Playing')
			expect(directives).toEqual([toPlayer(command)])
		})

		it('leaves volume buttons alone', () => {
			expect(run([button('VOL_UP', 'SHORT_PRESS')], playing).directives).toEqual([])
		})
	})

	it('stops playback and falls back to NoNetwork when Wi-Fi is lost while playing', () => {
		const { directives, orchestrator } = run([wifiLost], playing)

		expect(orchestrator.state).toBe('NoNetwork')
		expect(directives).toEqual([toPlayer(new Player.Commands.Stop()), changed('Playing', 'NoNetwork')])
	})

	it('shuts down on a critical battery and ignores everything after', () => {
		/**
		 * GIVEN playback is running
		 * WHEN the battery turns critical
		 * THEN playback is stopped, ShuttingDown is entered and announced, and later events change nothing
		 */
		const { directives, orchestrator } = run([batteryCritical, authenticated, tagAdded('04BB')], playing)

		expect(orchestrator.state).toBe('ShuttingDown')
		expect(directives).toEqual([
			toPlayer(new Player.Commands.Stop()),
			changed('Playing', 'ShuttingDown'),
			Directive.Emit({ event: new Messages.Events.SystemShutdown({ reason: 'battery_critical' }) }),
		])
	})

	describe('critical battery', () => {
		it.each([
			{ from: 'NoNetwork', history: [...peersStarted, wifiLost] },
			{ from: 'NoNetwork', history: [...ready, tagAdded('04AA'), tagResolved, wifiLost] },
			{ from: 'Offline', history: online },
			{ from: 'Offline', history: [...ready, authLost] },
			{ from: 'ReadyPaused', history: ready },
			{ from: 'ReadyPaused', history: [...ready, tagAdded('04AA'), tagResolved, playStopped] },
			{ from: 'Playing', history: [...ready, tagAdded('04AA'), tagResolved] },
			{ from: 'Playing', history: [...ready, tagAdded('04AA'), tagResolved, tagAdded('04BB')] },
		] as const)('stops playback and shuts down from $from', ({ from, history }) => {
			const before = run(history).orchestrator
			expect(before.state).toBe(from)

			const { directives, orchestrator } = run([batteryCritical], before)

			expect(orchestrator.state).toBe('ShuttingDown')
			expect(directives).toEqual([
				toPlayer(new Player.Commands.Stop()),
				changed(from, 'ShuttingDown'),
				Directive.Emit({ event: new Messages.Events.SystemShutdown({ reason: 'battery_critical' }) }),
			])
		})
	})

	describe('losing a required peer', () => {
		it('faults without a stop when the player itself went away', () => {
			const { directives, orchestrator } = run([stopped('plsm')], playing)

			expect(orchestrator.state).toBe('Faulted')
			expect(directives).toEqual([changed('Playing', 'Faulted')])
		})

		it('tells a still running player to stop', () => {
			const { directives, orchestrator } = run([stopped('nfcd')], playing)

			expect(orchestrator.state).toBe('Faulted')
			expect(directives).toEqual([toPlayer(new Player.Commands.Stop()), changed('Playing', 'Faulted')])
		})

		it('sends nothing to the player when not playing', () => {
			const { directives } = run([stopped('nfcd')], run(ready).orchestrator)

			expect(directives).toEqual([changed('ReadyPaused', 'Faulted')])
		})
	})
})
