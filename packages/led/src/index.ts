/**
 * @hearo/led - Status LED daemon (`ledd`)
 */

export * from './adapters/index.ts'
export * from './config/led.config.ts'
export * from './daemon/led.daemon.ts'
export * from './domain/led.domain.ts'
export * from './ports/index.ts'
