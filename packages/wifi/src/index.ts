/**
 * @hearo/wifi - Wi-Fi peer (`wsm`)
 */

export * from './adapters/index.ts'
export * from './config/wifi.config.ts'
export * from './daemon/wifi.daemon.ts'
export * from './domain/wifi-peer.domain.ts'
export * from './ports/index.ts'
