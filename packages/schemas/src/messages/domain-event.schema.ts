/**
 * DomainEvent - Union of every event published on the bus
 *
 * Daemons publish through it and the orchestrator folds it; an event whose name is not part of the union does not
 * decode and is ignored by consumers.
 */

import * as Schema from 'effect/Schema'

import * as Button from './button/index.ts'
import * as Lifecycle from './lifecycle/index.ts'
import * as Nfc from './nfc/index.ts'
import * as Orchestrator from './orchestrator/index.ts'
import * as Player from './player/index.ts'
import * as Power from './power/index.ts'
import * as Wifi from './wifi/index.ts'
import * as Wire from './wire.ts'

export const DomainEvent = Schema.Union(
	Lifecycle.Events.DaemonStarted,
	Lifecycle.Events.DaemonStopped,
	Lifecycle.Events.DaemonError,
	Lifecycle.Events.StateChanged,
	Button.Events.Events,
	Nfc.Events.Events,
	Wifi.Events.Events,
	Player.Events.Events,
	Power.Events.Events,
	Orchestrator.Events.Events,
)

export declare namespace DomainEvent {
	type Type = Schema.Schema.Type<typeof DomainEvent>
	type Encoded = Schema.Schema.Encoded<typeof DomainEvent>
	type Tag = DomainEvent.Type['_tag']
}

export const decodeDomainEvent = Wire.decode(DomainEvent)

export const encodeDomainEvent = Wire.encode(DomainEvent)
