import * as NodeContext from '@effect/platform-node/NodeContext'
import * as NodeRuntime from '@effect/platform-node/NodeRuntime'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import { BusConfig, Daemon, Logging } from '@hearo/platform'
import { UnixSocketEndpoint } from '@hearo/platform/adapters'

import { ShellNetworkStack } from '../adapters/shell-network-stack.adapter.ts'
import { WifiConfig } from '../config/wifi.config.ts'
import { wifiDaemon } from '../daemon/wifi.daemon.ts'

const Transport = UnixSocketEndpoint.Live.pipe(Layer.provide(BusConfig.Default))

const MainLayer = Layer.mergeAll(
	Daemon.layer('wsm'),
	ShellNetworkStack.Live.pipe(Layer.provideMerge(WifiConfig.Default)),
	Logging.layer,
).pipe(Layer.provide(Transport), Layer.provide(NodeContext.layer))

wifiDaemon.pipe(Effect.scoped, Effect.provide(MainLayer), NodeRuntime.runMain)
