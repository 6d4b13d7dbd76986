/**
 * biome-ignore-all lint/style/useNamingConvention: Registry keys mirror the wire names' modules and message classes.
 */
import type { ReadonlyRecord } from 'effect/Record'

import { ButtonPressed } from './button/events.schema.ts'
import { Off, SetError, SetFeedback, SetState } from './led/commands.schema.ts'
import { Restart } from './nfc/commands.schema.ts'
import { NfcReady, TagAdded, TagPresent, TagRemoved } from './nfc/events.schema.ts'
import { Initiated, SystemShutdown } from './orchestrator/events.schema.ts'
import { Next, Play, PlayerStatus, PlayTag, Previous, Seek, Shutdown, Stop } from './player/commands.schema.ts'
import {
	AuthFailed,
	AuthLost,
	Authenticated,
	Disconnected,
	PlaybackError,
	PlayStarted,
	PlayStopped,
	TagResolved,
	TagUnknown,
} from './player/events.schema.ts'
import { BatteryCritical, BatteryState } from './power/events.schema.ts'
import { WifiStatus } from './wifi/commands.schema.ts'
import { AccessPointStarted, AccessPointStopped, WifiConnected, WifiLost } from './wifi/events.schema.ts'

/**
 * Wire names of the daemon specific messages, grouped per module
 *
 * Command daemons use the registry to tell an unknown command (`UNKNOWN_CMD`) from a known one with a bad payload
 * (`BAD_PAYLOAD`). Lifecycle names are listed in the lifecycle module.
 */
export const Tag = {
	Button: {
		Commands: {
			Ping: 'BD_CMD_PING',
			SetDebug: 'BD_CMD_SET_DEBUG',
		},
		Events: {
			ButtonPressed: ButtonPressed.Tag,
		},
	},
	Led: {
		Commands: {
			LedPing: 'LED_PING',
			Off: Off.Tag,
			Ping: 'LEDD_CMD_PING',
			SetDebug: 'LEDD_CMD_SET_DEBUG',
			SetError: SetError.Tag,
			SetFeedback: SetFeedback.Tag,
			SetState: SetState.Tag,
		},
		Events: {},
	},
	Nfc: {
		Commands: {
			Ping: 'NFC_CMD_PING',
			Restart: Restart.Tag,
			SetDebug: 'NFC_CMD_SET_DEBUG',
		},
		Events: {
			NfcReady: NfcReady.Tag,
			TagAdded: TagAdded.Tag,
			TagPresent: TagPresent.Tag,
			TagRemoved: TagRemoved.Tag,
		},
	},
	Orchestrator: {
		Commands: {
			Ping: 'HCSM_CMD_PING',
			SetDebug: 'HCSM_CMD_SET_DEBUG',
		},
		Events: {
			Initiated: Initiated.Tag,
			SystemShutdown: SystemShutdown.Tag,
		},
	},
	Player: {
		Commands: {
			Next: Next.Tag,
			Ping: 'PLSM_CMD_PING',
			Play: Play.Tag,
			PlayerStatus: PlayerStatus.Tag,
			PlayTag: PlayTag.Tag,
			Previous: Previous.Tag,
			Seek: Seek.Tag,
			SetDebug: 'PLSM_CMD_SET_DEBUG',
			Shutdown: Shutdown.Tag,
			Stop: Stop.Tag,
		},
		Events: {
			AuthFailed: AuthFailed.Tag,
			AuthLost: AuthLost.Tag,
			Authenticated: Authenticated.Tag,
			Disconnected: Disconnected.Tag,
			PlaybackError: PlaybackError.Tag,
			PlayStarted: PlayStarted.Tag,
			PlayStopped: PlayStopped.Tag,
			TagResolved: TagResolved.Tag,
			TagUnknown: TagUnknown.Tag,
		},
	},
	Power: {
		Commands: {
			Ping: 'POWD_CMD_PING',
			SetDebug: 'POWD_CMD_SET_DEBUG',
		},
		Events: {
			BatteryCritical: BatteryCritical.Tag,
			BatteryState: BatteryState.Tag,
		},
	},
	Wifi: {
		Commands: {
			Ping: 'WSM_CMD_PING',
			SetDebug: 'WSM_CMD_SET_DEBUG',
			WifiStatus: WifiStatus.Tag,
		},
		Events: {
			AccessPointStarted: AccessPointStarted.Tag,
			AccessPointStopped: AccessPointStopped.Tag,
			WifiConnected: WifiConnected.Tag,
			WifiLost: WifiLost.Tag,
		},
	},
} as const satisfies Modules

type Dictionary = ReadonlyRecord<string, string>
type Module = 'Button' | 'Led' | 'Nfc' | 'Orchestrator' | 'Player' | 'Power' | 'Wifi'
type Modules = ReadonlyRecord<Module, ReadonlyRecord<'Commands' | 'Events', Dictionary>>
type ExtractModule<M extends Modules> = M[keyof M]
type ExtractTags<K extends 'Commands' | 'Events', M> = M extends ReadonlyRecord<K, infer D> ? D[keyof D] : never

export type CommandTag = ExtractTags<'Commands', ExtractModule<typeof Tag>>
export type EventTag = ExtractTags<'Events', ExtractModule<typeof Tag>>

/**
 * Wire names of the commands a module accepts
 */
export const commandNames = (module: Module): ReadonlyArray<string> => Object.values(Tag[module].Commands)
