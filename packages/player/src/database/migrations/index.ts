import type { Migrations } from '@hearo/platform/database'

import createTags from './0001_create_tags.ts'

export const migrations: Migrations = {
	'0001_create_tags': createTags,
}
