import * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Ref from 'effect/Ref'

import { PeerUnavailable } from '@hearo/platform'

import { NetworkStackPort, type StationReport } from '../ports/network-stack.port.ts'

interface Network {
	readonly stackAvailable: boolean
	readonly station: StationReport
	readonly internet: boolean
	readonly accessPointFails: boolean
	readonly calls: ReadonlyArray<string>
}

const disconnected: StationReport = { ip: null, rssi: null, ssid: null }

/**
 * SimulatedNetwork - Test controls behind a {@link NetworkStackPort}
 *
 * Starts with the tooling present, no station link and no internet.
 */
export class SimulatedNetwork extends Context.Tag('@hearo/wifi/adapters/SimulatedNetwork')<
	SimulatedNetwork,
	{
		readonly join: (station: StationReport) => Effect.Effect<void>
		readonly drop: Effect.Effect<void>
		readonly setInternet: (reachable: boolean) => Effect.Effect<void>
		readonly setStackAvailable: (available: boolean) => Effect.Effect<void>
		readonly setAccessPointFails: (fails: boolean) => Effect.Effect<void>
		/** Port operations in call order */
		readonly calls: Effect.Effect<ReadonlyArray<string>>
	}
>() {
	static readonly Test: Layer.Layer<NetworkStackPort | SimulatedNetwork> = Layer.effectContext(
		Effect.gen(function* () {
			const network = yield* Ref.make<Network>({
				accessPointFails: false,
				calls: [],
				internet: false,
				stackAvailable: true,
				station: disconnected,
			})

			const call = (name: string) =>
				Ref.updateAndGet(network, (current) => ({ ...current, calls: [...current.calls, name] }))

			const accessPoint = (name: string, code: string) =>
				call(name).pipe(
					Effect.flatMap((current) =>
						current.accessPointFails
							? Effect.fail(new PeerUnavailable({ code, kind: 'resource-unavailable', message: `${name} failed` }))
							: Effect.void,
					),
				)

			const port = NetworkStackPort.of({
				checkStack: call('checkStack').pipe(
					Effect.flatMap((current) =>
						current.stackAvailable
							? Effect.void
							: Effect.fail(
									new PeerUnavailable({
										code: 'ERR_NO_WPA_CLI',
										kind: 'resource-unavailable',
										message: 'wpa_cli not available',
									}),
								),
					),
				),
				internetReachable: call('internetReachable').pipe(Effect.map((current) => current.internet)),
				reconnect: Effect.asVoid(call('reconnect')),
				startAccessPoint: accessPoint('startAccessPoint', 'ERR_AP_START'),
				station: call('station').pipe(Effect.map((current) => current.station)),
				stopAccessPoint: accessPoint('stopAccessPoint', 'ERR_AP_STOP'),
			})

			const controls = SimulatedNetwork.of({
				calls: Ref.get(network).pipe(Effect.map((current) => current.calls)),
				drop: Ref.update(network, (current) => ({ ...current, station: disconnected })),
				join: (station) => Ref.update(network, (current) => ({ ...current, station })),
				setAccessPointFails: (fails) => Ref.update(network, (current) => ({ ...current, accessPointFails: fails })),
				setInternet: (reachable) => Ref.update(network, (current) => ({ ...current, internet: reachable })),
				setStackAvailable: (available) =>
					Ref.update(network, (current) => ({ ...current, stackAvailable: available })),
			})

			return Context.make(NetworkStackPort, port).pipe(Context.add(SimulatedNetwork, controls))
		}),
	)
}
