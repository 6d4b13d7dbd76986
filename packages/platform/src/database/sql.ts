/** biome-ignore-all lint/style/useNamingConvention: SQL is conventional abbreviation (matches Effect examples) */

import * as NodeContext from '@effect/platform-node/NodeContext'
import type * as Sql from '@effect/sql'
import * as SqliteNode from '@effect/sql-sqlite-node'
import * as Config from 'effect/Config'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as StringModule from 'effect/String'

/**
 * A migration set keyed `<id>_<name>`, e.g. `0001_create_tags`
 */
export type Migrations = Record<string, Effect.Effect<void, Sql.SqlError.SqlError, Sql.SqlClient.SqlClient>>

/**
 * Database configuration.
 *
 * Environment variables:
 *
 * - `HEARO_DB_PATH`: Database file path (default: `/var/lib/hearo/hearo.sqlite`)
 */
export class DatabaseConfig extends Effect.Service<DatabaseConfig>()('@hearo/platform/database/DatabaseConfig', {
	effect: Effect.gen(function* () {
		const filename = yield* Config.string('HEARO_DB_PATH').pipe(Config.withDefault('/var/lib/hearo/hearo.sqlite'))

		yield* Effect.logInfo('Database configuration loaded', { filename })

		return { filename }
	}).pipe(Effect.withSpan('DatabaseConfig')),
}) {}

/**
 * Session pragmas, set once the client is connected.
 *
 * - `foreign_keys = ON`
 * - `synchronous = NORMAL` (WAL mode)
 * - `temp_store = MEMORY`
 */
const PragmaLayer: Layer.Layer<never, Sql.SqlError.SqlError, SqliteNode.SqliteClient.SqliteClient> = Effect.gen(
	function* () {
		const sql = yield* SqliteNode.SqliteClient.SqliteClient

		yield* sql`PRAGMA foreign_keys = ON;`
		yield* sql`PRAGMA synchronous = NORMAL;`
		yield* sql`PRAGMA temp_store = MEMORY;`

		yield* Effect.logDebug('SQLite session pragmas configured')
	},
).pipe(Effect.withSpan('SQL.PragmaLayer'), Layer.effectDiscard)

/**
 * Client for the configured file; query names go out snake_case and come back camelCase.
 */
const ClientLayer = Effect.gen(function* () {
	const config = yield* DatabaseConfig

	yield* Effect.logInfo('Creating SQLite client', { filename: config.filename })

	const client = SqliteNode.SqliteClient.layer({
		filename: config.filename,
		transformQueryNames: StringModule.camelToSnake,
		transformResultNames: StringModule.snakeToCamel,
	})

	return Layer.provideMerge(client, Layer.provide(PragmaLayer, client))
}).pipe(Effect.withSpan('SQL.ClientLayer'), Layer.unwrapEffect)

const MigratorLayer = (migrations: Migrations) =>
	SqliteNode.SqliteMigrator.layer({
		loader: SqliteNode.SqliteMigrator.fromRecord(migrations),
		table: 'hearo_migrations',
	}).pipe(Layer.provide(NodeContext.layer))

/**
 * SQLite client layers that run the owner's migrations before anything queries.
 *
 * @example
 *
 * ```typescript
 * import { SQL } from '@hearo/platform/database'
 * import { migrations } from './database/migrations/index.ts'
 *
 * // File from HEARO_DB_PATH
 * Effect.provide(program, SQL.layer(migrations))
 *
 * // In-memory
 * Effect.provide(program, SQL.test(migrations))
 * ```
 */
export class SQL {
	static readonly layer = (migrations: Migrations) =>
		MigratorLayer(migrations).pipe(Layer.provideMerge(ClientLayer), Layer.provide(DatabaseConfig.Default))

	static readonly test = (migrations: Migrations) =>
		MigratorLayer(migrations).pipe(
			Layer.provideMerge(ClientLayer),
			Layer.provide(Layer.succeed(DatabaseConfig, new DatabaseConfig({ filename: ':memory:' }))),
		)
}
