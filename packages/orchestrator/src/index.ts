/**
 * @hearo/orchestrator - Central orchestrator (`hcsm`)
 */

export * from './daemon/orchestrator.daemon.ts'
export * from './domain/orchestrator.domain.ts'
export * from './domain/signal.domain.ts'
