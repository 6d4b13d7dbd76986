export * as Events from './events.schema.ts'
