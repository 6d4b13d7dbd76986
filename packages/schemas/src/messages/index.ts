/**
 * Bus messages, grouped per daemon
 *
 * Every event and command is a tagged schema whose `_tag` is its wire name. {@link DomainEvent} unions all events,
 * and each module exports the `Commands` union its daemon accepts.
 */

import * as Button from './button/index.ts'
import * as Led from './led/index.ts'
import * as Lifecycle from './lifecycle/index.ts'
import * as Nfc from './nfc/index.ts'
import * as Orchestrator from './orchestrator/index.ts'
import * as Player from './player/index.ts'
import * as Power from './power/index.ts'
import * as Wifi from './wifi/index.ts'
import * as Wire from './wire.ts'

export * from './common/commands.schema.ts'
export * from './domain-event.schema.ts'
export * from './tag.ts'

export { Button, Led, Lifecycle, Nfc, Orchestrator, Player, Power, Wifi, Wire }
