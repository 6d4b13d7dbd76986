/**
 * @hearo/player - Player peer (`plsm`)
 *
 * The playback backend is a port only; {@link SimulatedPlayback} stands in for it in tests.
 */

export * from './adapters/index.ts'
export * from './config/player.config.ts'
export * from './daemon/player.daemon.ts'
export * from './database/migrations/index.ts'
export * from './domain/player-peer.domain.ts'
export * from './ports/index.ts'
