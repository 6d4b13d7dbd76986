/**
 * Logging - Pretty console logs gated by a runtime adjustable threshold
 *
 * The threshold starts from `HEARO_LOG_LEVEL` (default `info`) and is changed by `*_CMD_SET_DEBUG` through
 * {@link LogThreshold.set}. Accepted level names: `none`, `error`, `warn`, `warning`, `info`, `debug`.
 */

import * as Config from 'effect/Config'
import type { ConfigError } from 'effect/ConfigError'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Logger from 'effect/Logger'
import * as LogLevel from 'effect/LogLevel'
import * as MutableRef from 'effect/MutableRef'
import * as Option from 'effect/Option'
import * as Record from 'effect/Record'

import { CommandRejected } from '../errors.ts'

const levels: Record.ReadonlyRecord<string, LogLevel.LogLevel> = {
	debug: LogLevel.Debug,
	error: LogLevel.Error,
	info: LogLevel.Info,
	none: LogLevel.None,
	warn: LogLevel.Warning,
	warning: LogLevel.Warning,
}

/**
 * Parses a level name, case-insensitively.
 */
export const parseLogLevel = (name: string): Option.Option<LogLevel.LogLevel> =>
	Record.get(levels, name.trim().toLowerCase())

export class LogThreshold extends Effect.Service<LogThreshold>()('@hearo/platform/logging/LogThreshold', {
	effect: Effect.gen(function* () {
		const configured = yield* Config.string('HEARO_LOG_LEVEL').pipe(Config.withDefault('info'))
		const threshold = MutableRef.make(Option.getOrElse(parseLogLevel(configured), () => LogLevel.Info))

		return {
			allows: (level: LogLevel.LogLevel): boolean => LogLevel.greaterThanEqual(level, MutableRef.get(threshold)),

			current: Effect.sync(() => MutableRef.get(threshold)),

			set: (name: string): Effect.Effect<LogLevel.LogLevel, CommandRejected> =>
				Option.match(parseLogLevel(name), {
					onNone: () =>
						Effect.fail(new CommandRejected({ code: 'INVALID_LEVEL', message: `unsupported log level: ${name}` })),
					onSome: (level) =>
						Effect.sync(() => MutableRef.set(threshold, level)).pipe(
							Effect.zipRight(Effect.logInfo('Log level changed', { level: level.label })),
							Effect.as(level),
						),
				}),
		}
	}),
}) {}

/**
 * Replaces the default logger with a pretty logger filtered by {@link LogThreshold}.
 *
 * The fiber minimum level is opened to `All` so the threshold alone decides what is printed.
 */
export const layer: Layer.Layer<LogThreshold, ConfigError> = Layer.unwrapEffect(
	Effect.map(LogThreshold, (threshold) =>
		Layer.merge(
			Logger.replace(Logger.defaultLogger, Logger.filterLogLevel(Logger.prettyLogger(), threshold.allows)),
			Logger.minimumLogLevel(LogLevel.All),
		),
	),
).pipe(Layer.provideMerge(LogThreshold.Default))
