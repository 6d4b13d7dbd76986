/**
 * Tests for EnvelopeId branded type
 */

import { describe, expect, test } from '@effect/vitest'
import * as Schema from 'effect/Schema'

import { EnvelopeId } from './envelope-id.schema.ts'

describe('EnvelopeId', () => {
	describe('schema validation', () => {
		test('accepts a non-empty id', () => {
			expect(Schema.decodeUnknownSync(EnvelopeId)('evt-bd-1')).toBe('evt-bd-1')
		})

		test('rejects an empty id', () => {
			expect(() => Schema.decodeUnknownSync(EnvelopeId)('')).toThrow()
		})
	})

	describe('.format()', () => {
		test('joins kind, origin and counter', () => {
			expect(EnvelopeId.format('ack', 'plsm', 7)).toBe('ack-plsm-7')
		})
	})
})
