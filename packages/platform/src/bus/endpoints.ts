import { type DaemonId, EndpointName } from '@hearo/schemas/shared'

/**
 * Well-known endpoint names
 *
 * The bus endpoint is bound by the orchestrator; every daemon publishes its events there and binds a command endpoint
 * named after itself.
 */
export const Endpoints = {
	command: (daemon: DaemonId.Type): EndpointName.Type => EndpointName.make(daemon),
	events: EndpointName.make('events'),
} as const
