export * from './endpoints.ts'
export * from './envelopes.ts'
export * from './event-publisher.ts'
export * from './message-bus.ts'
