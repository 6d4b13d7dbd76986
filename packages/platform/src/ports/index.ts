/**
 * Ports - Interfaces the bus and daemons need from the host
 *
 * Adapters provide concrete implementations for the Unix socket transport and for in-process tests.
 */

export * from './endpoint.port.ts'
