/**
 * Central orchestrator (`hcsm`) messages
 */

export * as Commands from './commands.schema.ts'
export * as Events from './events.schema.ts'
