import * as Sql from '@effect/sql'
import * as Effect from 'effect/Effect'
import { pipe } from 'effect/Function'
import * as Layer from 'effect/Layer'
import * as Schema from 'effect/Schema'

import { SQL } from '@hearo/platform/database'

import { migrations } from '../database/migrations/index.ts'
import { TagRecord, TagStoreError, TagStorePort } from '../ports/tag-store.port.ts'

/**
 * Row of the `tags` table, minus the bookkeeping `updated_at`
 */
class TagRow extends Sql.Model.Class<TagRow>('TagRow')({
	lastPosMs: Schema.NonNegativeInt,
	lastTrackUri: Schema.String,
	playlistUri: Schema.String,
	uid: Sql.Model.GeneratedByApp(TagRecord.fields.uid),
}) {}

const Progress = Schema.Struct({
	positionMs: Schema.NonNegativeInt,
	trackUri: Schema.String,
	uid: Schema.String,
})

const make: Effect.Effect<typeof TagStorePort.Service, never, Sql.SqlClient.SqlClient> = Effect.gen(function* () {
	const sql = yield* Sql.SqlClient.SqlClient

	/**
	 * SQL and decoding failures both surface as {@link TagStoreError}; the player answers them with `SQL_ERROR`.
	 */
	const mapSqlError = (operation: TagStoreError['operation']) =>
		Effect.mapError(
			(error: unknown) =>
				new TagStoreError({
					cause: error,
					message: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
					operation,
				}),
		)

	const resolve = Effect.fn('TagStore.Live.resolve')((uid: string) =>
		pipe(
			uid,
			Sql.SqlSchema.findOne({
				execute: (uid) =>
					sql`
              SELECT uid, playlist_uri, last_track_uri, last_pos_ms
              FROM tags
              WHERE uid = ${uid};
					`,
				Request: Schema.String,
				Result: TagRow,
			}),
			mapSqlError('resolve'),
			Effect.tap(Effect.annotateCurrentSpan({ uid })),
		),
	)

	const saveProgress = Effect.fn('TagStore.Live.saveProgress')((progress: typeof Progress.Type) =>
		pipe(
			progress,
			Sql.SqlSchema.void({
				execute: ({ positionMs, trackUri, uid }) =>
					sql`
              UPDATE tags
              SET last_track_uri = ${trackUri},
                  last_pos_ms    = ${positionMs},
                  updated_at     = strftime('%s', 'now')
              WHERE uid = ${uid};
					`,
				Request: Progress,
			}),
			mapSqlError('saveProgress'),
			Effect.tap(Effect.annotateCurrentSpan({ positionMs: progress.positionMs, uid: progress.uid })),
		),
	)

	return TagStorePort.of({ resolve, saveProgress })
})

/**
 * SqliteTagStore - {@link TagStorePort} over the `tags` table
 *
 * - `Live`: the database file from `HEARO_DB_PATH`, migrated on startup
 * - `Test`: a fresh in-memory database per layer build; the SQL client is exposed so tests can seed tags
 */
export class SqliteTagStore {
	static readonly Live = Layer.provide(Layer.effect(TagStorePort, make), SQL.layer(migrations))

	static readonly Test = Layer.provideMerge(Layer.effect(TagStorePort, make), SQL.test(migrations))
}
