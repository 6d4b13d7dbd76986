/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
import * as Schema from 'effect/Schema'

import { Ping, SetDebug } from '../common/commands.schema.ts'

export const PowerPing = Ping('POWD_CMD_PING')
export const PowerSetDebug = SetDebug('POWD_CMD_SET_DEBUG')

export const Commands = Schema.Union(PowerPing, PowerSetDebug)

export declare namespace Commands {
	type Type = Schema.Schema.Type<typeof Commands>
	type Tag = Type['_tag']
}
