/**
 * Shell network stack adapter
 *
 * Drives `wpa_cli`, `iwgetid`, `hostname`, `iw`, `ping` and `systemctl` through `@effect/platform` Command. Station
 * probes are tolerant: a missing tool or unexpected output reads as an unknown field. The access point is the
 * `hearo-ap.target` systemd unit.
 */

import * as Command from '@effect/platform/Command'
import * as CommandExecutor from '@effect/platform/CommandExecutor'
import type { PlatformError } from '@effect/platform/Error'
import type * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import { PeerUnavailable } from '@hearo/platform'

import { WifiConfig } from '../config/wifi.config.ts'
import { NetworkStackPort } from '../ports/network-stack.port.ts'

const nonEmpty = (value: string | undefined): string | null => {
	const trimmed = value?.trim() ?? ''
	return trimmed === '' ? null : trimmed
}

/**
 * SSID from `wpa_cli status` (`ssid=<name>` line).
 */
export const parseWpaSsid = (output: string): string | null =>
	nonEmpty(
		output
			.split('\n')
			.find((line) => line.startsWith('ssid='))
			?.slice('ssid='.length),
	)

/**
 * First address printed by `hostname -I`.
 */
export const parseFirstAddress = (output: string): string | null => nonEmpty(output.trim().split(/\s+/)[0])

/**
 * Signal strength from `iw dev <iface> link` (`signal: -52 dBm`).
 */
export const parseSignal = (output: string): number | null => {
	const line = output
		.split('\n')
		.map((raw) => raw.trim())
		.find((raw) => raw.startsWith('signal:'))
	const dbm = Number.parseInt(line?.split(/\s+/)[1] ?? '', 10)
	return Number.isNaN(dbm) ? null : dbm
}

const AccessPointUnit = 'hearo-ap.target'

const make: Effect.Effect<
	Context.Tag.Service<NetworkStackPort>,
	never,
	CommandExecutor.CommandExecutor | WifiConfig
> = Effect.gen(function* () {
	const executor = yield* CommandExecutor.CommandExecutor
	const { iface, probeHost } = yield* WifiConfig

	const output = (command: Command.Command) =>
		Command.string(command).pipe(Effect.provideService(CommandExecutor.CommandExecutor, executor))

	const exitCode = (command: Command.Command) =>
		Command.exitCode(command).pipe(Effect.provideService(CommandExecutor.CommandExecutor, executor))

	const probe = <A>(label: string, command: Command.Command, parse: (output: string) => A | null) =>
		output(command).pipe(
			Effect.map(parse),
			Effect.catchAll((error: PlatformError) =>
				Effect.logDebug('Network probe failed', { error: error.message, probe: label }).pipe(Effect.as(null)),
			),
		)

	const unavailable =
		(code: string, kind: PeerUnavailable['kind']) =>
		(message: string): PeerUnavailable =>
			new PeerUnavailable({ code, kind, message })

	const succeeds = (command: Command.Command, onFailure: (message: string) => PeerUnavailable) =>
		exitCode(command).pipe(
			Effect.mapError((error) => onFailure(error.message)),
			Effect.flatMap((code) =>
				code === 0 ? Effect.void : Effect.fail(onFailure(`exited with code ${code}`)),
			),
		)

	return NetworkStackPort.of({
		checkStack: succeeds(
			Command.make('which', 'wpa_cli'),
			unavailable('ERR_NO_WPA_CLI', 'resource-unavailable'),
		),

		internetReachable: exitCode(Command.make('ping', '-c', '1', '-W', '2', probeHost)).pipe(
			Effect.map((code) => code === 0),
			Effect.mapError((error) => unavailable('ERR_NO_PING', 'resource-unavailable')(error.message)),
		),

		reconnect: succeeds(Command.make('wpa_cli', '-i', iface, 'reconnect'), unavailable('ERR_RECONNECT', 'transient')),

		startAccessPoint: succeeds(
			Command.make('systemctl', 'start', AccessPointUnit),
			unavailable('ERR_AP_START', 'resource-unavailable'),
		),

		station: Effect.gen(function* () {
			const ssid =
				(yield* probe('wpa_cli status', Command.make('wpa_cli', '-i', iface, 'status'), parseWpaSsid)) ??
				(yield* probe('iwgetid', Command.make('iwgetid', '-r'), nonEmpty))

			return {
				ip: yield* probe('hostname -I', Command.make('hostname', '-I'), parseFirstAddress),
				rssi: yield* probe('iw link', Command.make('iw', 'dev', iface, 'link'), parseSignal),
				ssid,
			}
		}),

		stopAccessPoint: succeeds(
			Command.make('systemctl', 'stop', AccessPointUnit),
			unavailable('ERR_AP_STOP', 'resource-unavailable'),
		),
	})
})

export class ShellNetworkStack {
	static readonly Live: Layer.Layer<NetworkStackPort, never, CommandExecutor.CommandExecutor | WifiConfig> =
		Layer.effect(NetworkStackPort, make)
}
