/**
 * Wire codec for named messages
 *
 * On the wire the message name lives in the envelope (`event` or `cmd`) and the payload is a flat object. In the
 * domain both are merged into one tagged value whose `_tag` is the wire name. These helpers move between the two.
 */

import * as Effect from 'effect/Effect'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

export interface WireMessage {
	readonly name: string
	readonly payload: Readonly<Record<string, unknown>>
}

/**
 * Decodes a wire message against a union of tagged schemas.
 *
 * @example
 *
 * ```typescript
 * const command = yield* Wire.decode(Player.Commands.Commands)({ name: 'PLSM_COMMAND_SEEK', payload: { delta_ms: 15000 } })
 * // Seek { _tag: 'PLSM_COMMAND_SEEK', deltaMs: 15000 }
 * ```
 */
export const decode =
	<A, I extends { readonly _tag: string }>(schema: Schema.Schema<A, I>) =>
	(message: WireMessage): Effect.Effect<A, ParseResult.ParseError> =>
		Schema.decodeUnknown(schema)({ ...message.payload, _tag: message.name })

/**
 * Encodes a tagged value into its wire name and payload.
 */
export const encode =
	<A, I extends { readonly _tag: string }>(schema: Schema.Schema<A, I>) =>
	(value: A): Effect.Effect<WireMessage, ParseResult.ParseError> =>
		Schema.encode(schema)(value).pipe(
			Effect.map((encoded): WireMessage => {
				const { _tag, ...payload } = encoded
				return { name: _tag, payload }
			}),
		)
