/**
 * @hearo/power - Battery monitoring daemon (`powd`)
 */

export * from './adapters/index.ts'
export * from './config/power.config.ts'
export * from './daemon/power.daemon.ts'
export * from './domain/power.domain.ts'
export * from './ports/index.ts'
