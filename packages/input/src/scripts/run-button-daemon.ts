import * as NodeContext from '@effect/platform-node/NodeContext'
import * as NodeRuntime from '@effect/platform-node/NodeRuntime'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import { BusConfig, Daemon, Logging } from '@hearo/platform'
import { UnixSocketEndpoint } from '@hearo/platform/adapters'

import { SysfsGpio } from '../adapters/sysfs-gpio.adapter.ts'
import { ButtonConfig } from '../config/button.config.ts'
import { buttonDaemon } from '../daemon/button.daemon.ts'

const Transport = UnixSocketEndpoint.Live.pipe(Layer.provide(BusConfig.Default))

const MainLayer = Layer.mergeAll(Daemon.layer('bd'), ButtonConfig.Default, SysfsGpio.Live, Logging.layer).pipe(
	Layer.provide(Transport),
	Layer.provide(NodeContext.layer),
)

buttonDaemon.pipe(Effect.scoped, Effect.provide(MainLayer), NodeRuntime.runMain)
