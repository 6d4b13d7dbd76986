/**
 * Envelope schemas
 *
 * Framing of events, commands, acks and results on the local bus.
 */

export * from './envelope.schema.ts'
