/**
 * EndpointName - Name of a process-owned receive address on the local bus
 *
 * An endpoint resolves to `<socketDir>/<name>.sock`; names are therefore restricted to a path-safe alphabet.
 */

import * as Schema from 'effect/Schema'

const EndpointNameBrand: unique symbol = Symbol.for('@hearo/schemas/shared/EndpointName')

export class EndpointName extends Schema.String.pipe(
	Schema.pattern(/^[a-z][a-z0-9_-]*$/),
	Schema.brand(EndpointNameBrand),
) {}

export declare namespace EndpointName {
	type Type = typeof EndpointName.Type
	type Encoded = typeof EndpointName.Encoded
}
