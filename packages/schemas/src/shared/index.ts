/**
 * Shared foundational schemas
 *
 * Branded identities and value objects used by envelopes and messages alike.
 */

export * from './daemon-id.schema.ts'
export * from './endpoint-name.schema.ts'
export * from './envelope-id.schema.ts'
export * from './error-info.schema.ts'
