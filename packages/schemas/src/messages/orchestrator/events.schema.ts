/** biome-ignore-all lint/style/useNamingConvention: wire names are SCREAMING_SNAKE_CASE */
import * as Schema from 'effect/Schema'

/**
 * Initiated - All required peers started and network status is known; emitted once per process lifetime
 */
export class Initiated extends Schema.TaggedClass<Initiated>()('HCSM_EVENT_INITIATED', {}) {
	static readonly Tag = Initiated._tag
}

/**
 * Shutdown - The orchestrator entered its terminal state
 */
export class SystemShutdown extends Schema.TaggedClass<SystemShutdown>()('HCSM_EVENT_SHUTDOWN', {
	reason: Schema.String,
}) {
	static readonly Tag = SystemShutdown._tag
}

export const Events = Schema.Union(Initiated, SystemShutdown)

export declare namespace Events {
	type Type = Schema.Schema.Type<typeof Events>
	type Tag = Type['_tag']
}
