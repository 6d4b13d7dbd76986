import * as Sql from '@effect/sql'
import { describe, expect, it } from '@effect/vitest'
import * as Effect from 'effect/Effect'

import { type Migrations, SQL } from './sql.ts'

const migrations: Migrations = {
	'0001_create_probe': Effect.gen(function* () {
		const sql = yield* Sql.SqlClient.SqlClient
		yield* sql`CREATE TABLE probe (id TEXT PRIMARY KEY, parent_id TEXT REFERENCES probe (id))`
	}),
}

describe('SQL', () => {
	it.scoped('runs the given migrations and records them', () =>
		Effect.gen(function* () {
			const sql = yield* Sql.SqlClient.SqlClient

			const tables = yield* sql<{ name: string }>`
				SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'probe'
			`
			const applied = yield* sql<{ migrationId: number; name: string }>`
				SELECT migration_id, name FROM hearo_migrations ORDER BY migration_id
			`

			expect(tables).toEqual([{ name: 'probe' }])
			expect(applied).toEqual([{ migrationId: 1, name: 'create_probe' }])
		}).pipe(Effect.provide(SQL.test(migrations))),
	)

	it.scoped('enables foreign key enforcement', () =>
		Effect.gen(function* () {
			const sql = yield* Sql.SqlClient.SqlClient

			const [pragma] = yield* sql<{ foreignKeys: number }>`PRAGMA foreign_keys`
			const insert = yield* sql`INSERT INTO probe (id, parent_id) VALUES ('child', 'missing')`.pipe(Effect.either)

			expect(pragma?.foreignKeys).toBe(1)
			expect(insert._tag).toBe('Left')
		}).pipe(Effect.provide(SQL.test(migrations))),
	)
})
