/**
 * Envelope Schemas
 *
 * The four message kinds exchanged on the bus. Every envelope shares the header (`schema`, `v`, `id`, `ts`) and
 * carries a kind-specific body:
 *
 * - `event` - a named notification published to the bus endpoint
 * - `cmd` - a named request sent to a daemon's command endpoint
 * - `ack` - accepted or rejected, sent back to the command's `reply` endpoint
 * - `result` - outcome of an accepted command, sent to the same `reply` endpoint
 *
 * Wire keys are snake_case; domain fields are camelCase and `ts` decodes to a `DateTime.Utc`.
 */

import * as Effect from 'effect/Effect'
import { pipe } from 'effect/Function'
import * as Option from 'effect/Option'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'
import * as StringModule from 'effect/String'

import { EndpointName, EnvelopeId, ErrorInfo } from '../shared/index.ts'

/**
 * Protocol version stamped on every envelope
 */
export const ProtocolVersion = Schema.Literal(1)

/**
 * Open payload mapping; its shape is validated against the message schema named by the envelope
 */
export const Payload = Schema.Record({ key: Schema.String, value: Schema.Unknown })

export declare namespace Payload {
	type Type = typeof Payload.Type
}

const header = {
	id: EnvelopeId,
	ts: Schema.DateTimeUtcFromNumber,
	v: ProtocolVersion,
}

const optionalPayload = Schema.optionalWith(Payload, { default: () => ({}) })

const optionalError = Schema.optionalWith(ErrorInfo, { as: 'Option', nullable: true })

const correlatesTo = Schema.propertySignature(EnvelopeId).pipe(Schema.fromKey('correlates_to'))

/**
 * EventEnvelope - A published event
 *
 * **Wire Format (DTO)**:
 *
 * ```json
 * { "schema": "event", "v": 1, "id": "evt-bd-4", "ts": 1730000000000, "event": "BD_EVENT_BUTTON", "payload": {} }
 * ```
 */
export class EventEnvelope extends Schema.Class<EventEnvelope>('EventEnvelope')({
	...header,
	event: Schema.NonEmptyTrimmedString,
	payload: optionalPayload,
	schema: Schema.tag('event'),
}) {}

/**
 * CommandEnvelope - A request addressed to one daemon
 *
 * `reply` names the endpoint for the ack and result. An empty or missing `reply` means the sender does not want an
 * answer, and none is sent. `timeout_ms` is advisory and defaults to 1000.
 */
export class CommandEnvelope extends Schema.Class<CommandEnvelope>('CommandEnvelope')({
	...header,
	cmd: Schema.NonEmptyTrimmedString,
	payload: optionalPayload,
	reply: Schema.optionalWith(Schema.String, { default: () => '', nullable: true }),
	schema: Schema.tag('cmd'),
	timeoutMs: Schema.optionalWith(Schema.NonNegativeInt, { default: () => 1000 }).pipe(Schema.fromKey('timeout_ms')),
}) {
	/**
	 * Endpoint the ack and result go to, if the sender asked for a reply
	 */
	get replyEndpoint(): Option.Option<EndpointName.Type> {
		return pipe(
			Option.some(this.reply),
			Option.filter(StringModule.isNonEmpty),
			Option.flatMap(Schema.decodeOption(EndpointName)),
		)
	}
}

/**
 * AckEnvelope - Whether a command was accepted
 *
 * `ok: false` carries an `error` and is never followed by a result.
 */
export class AckEnvelope extends Schema.Class<AckEnvelope>('AckEnvelope')({
	...header,
	correlatesTo,
	error: optionalError,
	ok: Schema.Boolean,
	schema: Schema.tag('ack'),
}) {}

/**
 * ResultEnvelope - Outcome of an accepted command
 */
export class ResultEnvelope extends Schema.Class<ResultEnvelope>('ResultEnvelope')({
	...header,
	correlatesTo,
	error: optionalError,
	ok: Schema.Boolean,
	payload: optionalPayload,
	schema: Schema.tag('result'),
}) {}

/**
 * Envelope - Any message on the bus, discriminated by `schema`
 */
export const Envelope = Schema.Union(EventEnvelope, CommandEnvelope, AckEnvelope, ResultEnvelope)

export declare namespace Envelope {
	type Type = Schema.Schema.Type<typeof Envelope>
	type Dto = Schema.Schema.Encoded<typeof Envelope>
	type Kind = Type['schema']
}

/**
 * Decodes one frame into an envelope.
 *
 * Fails with a `ParseError` on invalid JSON, an unknown `schema` or a body that does not fit its kind.
 */
export const decodeEnvelopeJson: (frame: string) => Effect.Effect<Envelope.Type, ParseResult.ParseError> =
	Schema.decode(Schema.parseJson(Envelope))

/**
 * Encodes an envelope into one JSON frame.
 */
export const encodeEnvelopeJson = (envelope: Envelope.Type): Effect.Effect<string, ParseResult.ParseError> =>
	pipe(envelope, Schema.encode(Envelope), Effect.map((dto) => JSON.stringify(dto)))
