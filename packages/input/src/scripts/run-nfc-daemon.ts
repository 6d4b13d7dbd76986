import * as NodeContext from '@effect/platform-node/NodeContext'
import * as NodeRuntime from '@effect/platform-node/NodeRuntime'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import { BusConfig, Daemon, Logging } from '@hearo/platform'
import { UnixSocketEndpoint } from '@hearo/platform/adapters'

import { SimulatedNfc } from '../adapters/simulated-nfc.adapter.ts'
import { NfcConfig } from '../config/nfc.config.ts'
import { nfcDaemon } from '../daemon/nfc.daemon.ts'

const Transport = UnixSocketEndpoint.Live.pipe(Layer.provide(BusConfig.Default))

// No PN532 driver ships with the daemon; the simulated reader stays empty until a tag is placed on it
const MainLayer = Layer.mergeAll(Daemon.layer('nfcd'), NfcConfig.Default, SimulatedNfc.Test, Logging.layer).pipe(
	Layer.provide(Transport),
	Layer.provide(NodeContext.layer),
)

nfcDaemon.pipe(Effect.scoped, Effect.provide(MainLayer), NodeRuntime.runMain)
