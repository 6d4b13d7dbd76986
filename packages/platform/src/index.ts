/**
 * @hearo/platform - Coordination layer shared by every daemon
 *
 * - `bus/` - envelope construction, publishing and listening
 * - `daemon/` - the cooperative daemon loop and the command protocol
 * - `peer/` - backoff and collaborator error classification for peer state machines
 * - `logging/` - threshold filtered console logging
 */

export * from './bus/index.ts'
export * from './config/bus.config.ts'
export * from './daemon/index.ts'
export * from './errors.ts'
export * from './logging/index.ts'
export * from './peer/index.ts'
