export * from './backoff.ts'
export * from './collaborator.ts'
export * from './peer-errors.ts'
