import * as Schema from 'effect/Schema'

/**
 * ErrorInfo - Structured error carried by acks and results
 *
 * **Wire format**: `{ "code": "BAD_PAYLOAD", "message": "missing uid" }`
 */
export class ErrorInfo extends Schema.Class<ErrorInfo>('ErrorInfo')({
	code: Schema.String,
	message: Schema.String,
}) {}

export declare namespace ErrorInfo {
	type Type = Schema.Schema.Type<typeof ErrorInfo>
	type Dto = Schema.Schema.Encoded<typeof ErrorInfo>
}
