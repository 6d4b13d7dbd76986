export * from './command-responder.ts'
export * from './common-commands.ts'
export * from './daemon-context.ts'
export * from './daemon-identity.ts'
export * as Daemon from './daemon.ts'
