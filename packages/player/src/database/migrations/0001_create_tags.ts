import { SqlClient, type SqlError } from '@effect/sql'
import * as Effect from 'effect/Effect'

/**
 * Migration 0001: Tag to media mapping with the last playback position of each tag
 *
 * `last_track_uri = ''` with `last_pos_ms = 0` means "never played, start the playlist".
 */
const migration: Effect.Effect<void, SqlError.SqlError, SqlClient.SqlClient> = Effect.gen(function* () {
	const sql = yield* SqlClient.SqlClient

	yield* sql`CREATE TABLE tags
(
    uid            TEXT PRIMARY KEY,
    playlist_uri   TEXT    NOT NULL,
    last_track_uri TEXT    NOT NULL DEFAULT '',
    last_pos_ms    INTEGER NOT NULL DEFAULT 0,
    updated_at     INTEGER NOT NULL DEFAULT (strftime('%s', 'now'))
);
	`

	yield* sql`CREATE INDEX idx_tags_playlist_uri ON tags (playlist_uri);`

	yield* Effect.logInfo('Migration 0001_create_tags applied')
}).pipe(Effect.withSpan('Migration.0001_create_tags'))

export default migration
