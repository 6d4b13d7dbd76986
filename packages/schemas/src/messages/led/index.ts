/**
 * LED daemon (`ledd`) messages
 *
 * The daemon publishes lifecycle events only.
 */

export * as Commands from './commands.schema.ts'
