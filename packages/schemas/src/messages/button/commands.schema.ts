/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
import * as Schema from 'effect/Schema'

import { Ping, SetDebug } from '../common/commands.schema.ts'

export const ButtonPing = Ping('BD_CMD_PING')
export const ButtonSetDebug = SetDebug('BD_CMD_SET_DEBUG')

export const Commands = Schema.Union(ButtonPing, ButtonSetDebug)

export declare namespace Commands {
	type Type = Schema.Schema.Type<typeof Commands>
	type Tag = Type['_tag']
}
