import * as NodeContext from '@effect/platform-node/NodeContext'
import * as NodeRuntime from '@effect/platform-node/NodeRuntime'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import { BusConfig, Daemon, Logging } from '@hearo/platform'
import { UnixSocketEndpoint } from '@hearo/platform/adapters'

import { orchestratorDaemon } from '../daemon/orchestrator.daemon.ts'

const Transport = UnixSocketEndpoint.Live.pipe(Layer.provide(BusConfig.Default))

const MainLayer = Layer.mergeAll(Daemon.layer('hcsm'), Logging.layer).pipe(
	Layer.provide(Transport),
	Layer.provide(NodeContext.layer),
)

orchestratorDaemon.pipe(Effect.scoped, Effect.provide(MainLayer), NodeRuntime.runMain)
