import * as NodeContext from '@effect/platform-node/NodeContext'
import * as NodeRuntime from '@effect/platform-node/NodeRuntime'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import { BusConfig, Daemon, Logging } from '@hearo/platform'
import { UnixSocketEndpoint } from '@hearo/platform/adapters'

import { SimulatedPlayback } from '../adapters/simulated-playback.adapter.ts'
import { SqliteTagStore } from '../adapters/sqlite-tag-store.adapter.ts'
import { PlayerConfig } from '../config/player.config.ts'
import { playerDaemon } from '../daemon/player.daemon.ts'

const Transport = UnixSocketEndpoint.Live.pipe(Layer.provide(BusConfig.Default))

// No speaker backend ships with the daemon; playback runs against the in-process speaker
const MainLayer = Layer.mergeAll(
	Daemon.layer('plsm'),
	SimulatedPlayback.Test,
	SqliteTagStore.Live,
	PlayerConfig.Default,
	Logging.layer,
).pipe(Layer.provide(Transport), Layer.provide(NodeContext.layer))

playerDaemon.pipe(Effect.scoped, Effect.provide(MainLayer), NodeRuntime.runMain)
