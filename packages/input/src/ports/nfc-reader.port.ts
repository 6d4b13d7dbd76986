/**
 * NFC Reader Port - One read cycle of the contactless reader
 */

import * as Context from 'effect/Context'
import type * as Effect from 'effect/Effect'
import type * as Option from 'effect/Option'
import * as Schema from 'effect/Schema'

export class NfcReaderError extends Schema.TaggedError<NfcReaderError>()('NfcReaderError', {
	/** `HW_NOT_FOUND` on initialisation, `I2C_TIMEOUT` on read */
	code: Schema.String,
	message: Schema.String,
}) {}

export interface TagReading {
	/** Uppercase hex, no separators */
	readonly uid: string
	readonly tech: string
	readonly ats: string | null
}

export class NfcReaderPort extends Context.Tag('@hearo/input/ports/NfcReaderPort')<
	NfcReaderPort,
	{
		/**
		 * (Re)initialises the reader hardware.
		 */
		readonly initialize: Effect.Effect<void, NfcReaderError>

		/**
		 * Looks for a tag in the field once; none when the field is empty.
		 */
		readonly read: Effect.Effect<Option.Option<TagReading>, NfcReaderError>
	}
>() {}
