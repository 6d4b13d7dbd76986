import { describe, expect, test } from '@effect/vitest'
import * as Schema from 'effect/Schema'

import { EndpointName } from './endpoint-name.schema.ts'

describe('EndpointName', () => {
	test.each(['events', 'plsm', 'nfc_2', 'led-ring'])('accepts %s', (name) => {
		expect(Schema.is(EndpointName)(name)).toBe(true)
	})

	test.each(['', 'Events', '../etc/passwd', '2bd', 'with space'])('rejects %j', (name) => {
		expect(Schema.is(EndpointName)(name)).toBe(false)
	})
})
