import * as NodeContext from '@effect/platform-node/NodeContext'
import * as NodeRuntime from '@effect/platform-node/NodeRuntime'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import { BusConfig, Daemon, Logging } from '@hearo/platform'
import { UnixSocketEndpoint } from '@hearo/platform/adapters'

import { SimulatedStrip } from '../adapters/simulated-led-strip.adapter.ts'
import { LedConfig } from '../config/led.config.ts'
import { ledDaemon } from '../daemon/led.daemon.ts'

const Transport = UnixSocketEndpoint.Live.pipe(Layer.provide(BusConfig.Default))

const MainLayer = Layer.mergeAll(Daemon.layer('ledd'), SimulatedStrip.Console, LedConfig.Default, Logging.layer).pipe(
	Layer.provide(Transport),
	Layer.provide(NodeContext.layer),
)

ledDaemon.pipe(Effect.scoped, Effect.provide(MainLayer), NodeRuntime.runMain)
