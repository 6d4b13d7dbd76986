/**
 * EnvelopeId - Process-unique identifier of a bus message
 *
 * Wire form is `<kind>-<origin>-<counter>` (e.g. `evt-bd-12`, `ack-plsm-3`). The counter is monotonic per process, so
 * ids distinguish messages of one process lifetime but are not globally unique.
 */

import * as Schema from 'effect/Schema'

const EnvelopeIdBrand: unique symbol = Symbol.for('@hearo/schemas/shared/EnvelopeId')

export class EnvelopeId extends Schema.NonEmptyTrimmedString.pipe(Schema.brand(EnvelopeIdBrand)) {
	/**
	 * Formats an id from its parts.
	 *
	 * @example
	 *
	 * ```typescript
	 * EnvelopeId.format('evt', 'bd', 12) // 'evt-bd-12'
	 * ```
	 */
	static readonly format = (kind: EnvelopeId.Kind, origin: string, counter: number): EnvelopeId.Type =>
		EnvelopeId.make(`${kind}-${origin}-${counter}`)
}

export declare namespace EnvelopeId {
	type Type = typeof EnvelopeId.Type
	type Encoded = typeof EnvelopeId.Encoded

	/** Id prefix per message kind */
	type Kind = 'evt' | 'cmd' | 'ack' | 'res'
}
