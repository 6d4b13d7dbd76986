/**
 * @hearo/input - Physical input daemons
 *
 * - `domain/` - the debounce and interaction classification machine
 * - `daemon/` - the button (`bd`) and NFC (`nfcd`) daemons
 * - `ports/`, `adapters/` - GPIO lines and the NFC reader
 */

export * from './adapters/index.ts'
export * from './config/button.config.ts'
export * from './config/nfc.config.ts'
export * from './daemon/button.daemon.ts'
export * from './daemon/nfc.daemon.ts'
export * from './domain/debounce.domain.ts'
export * from './ports/index.ts'
