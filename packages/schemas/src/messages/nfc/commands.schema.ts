/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
import * as Schema from 'effect/Schema'

import { Ping, SetDebug } from '../common/commands.schema.ts'

/**
 * Restart - re-initialises the reader on the next tick; answered with `{ "restart": "scheduled" }`
 */
export class Restart extends Schema.TaggedClass<Restart>()('NFC_CMD_RESTART', {}) {
	static readonly Tag = Restart._tag
}

export const NfcPing = Ping('NFC_CMD_PING')
export const NfcSetDebug = SetDebug('NFC_CMD_SET_DEBUG')

export const Commands = Schema.Union(NfcPing, NfcSetDebug, Restart)

export declare namespace Commands {
	type Type = Schema.Schema.Type<typeof Commands>
	type Tag = Type['_tag']
}
