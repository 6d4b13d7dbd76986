/**
 * Platform Adapters - Implementations of the endpoint port
 *
 * - {@link UnixSocketEndpoint} - Unix stream sockets under the configured socket directory
 * - {@link InMemoryEndpoint} - in-process queues for tests
 */

export * from './in-memory-endpoint.adapter.ts'
export * from './unix-socket-endpoint.adapter.ts'
