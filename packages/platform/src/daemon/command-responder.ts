/**
 * Command responder - Answers one command envelope
 *
 * Protocol:
 *
 * 1. the command is decoded against the daemon's command union; an unknown name is rejected with `UNKNOWN_CMD`, a
 *    known name with a payload that does not fit with `BAD_PAYLOAD`
 * 2. the handler accepts (returning the work to do) or rejects with {@link CommandRejected}
 * 3. rejected: `ack ok=false`, no result
 * 4. accepted: `ack ok=true`, then the work runs and its outcome is sent as exactly one result
 *
 * Acks and results go to the command's reply endpoint. Without one the command still executes but nothing is sent.
 */

import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Option from 'effect/Option'
import type * as Schema from 'effect/Schema'

import type { CommandEnvelope, Envelope, Payload } from '@hearo/schemas/envelope'
import { Wire } from '@hearo/schemas/messages'

import { Envelopes } from '../bus/envelopes.ts'
import { MessageBus } from '../bus/message-bus.ts'
import { type CommandFailed, CommandRejected } from '../errors.ts'

/**
 * Work of an accepted command, producing the result payload
 */
export type Accepted<R = never> = Effect.Effect<Payload.Type, CommandFailed, R>

export type CommandHandler<C, R> = (command: C) => Effect.Effect<Accepted<R>, CommandRejected, R>

export interface CommandSet<C, I extends { readonly _tag: string }> {
	readonly schema: Schema.Schema<C, I>
	/** Every wire name the schema accepts */
	readonly names: ReadonlyArray<string>
}

/**
 * Accepts a command whose work is already done.
 */
export const accept = <R = never>(payload: Payload.Type = {}): Effect.Effect<Accepted<R>> =>
	Effect.succeed(Effect.succeed(payload))

const decode = <C, I extends { readonly _tag: string }>(commands: CommandSet<C, I>, envelope: CommandEnvelope) =>
	Wire.decode(commands.schema)({ name: envelope.cmd, payload: envelope.payload }).pipe(
		Effect.mapError((error) =>
			commands.names.includes(envelope.cmd)
				? new CommandRejected({ code: 'BAD_PAYLOAD', message: error.message })
				: new CommandRejected({ code: 'UNKNOWN_CMD', message: `unknown command: ${envelope.cmd}` }),
		),
	)

export const respond = <C, I extends { readonly _tag: string }, R>(
	commands: CommandSet<C, I>,
	handler: CommandHandler<C, R>,
	envelope: CommandEnvelope,
): Effect.Effect<void, never, R | MessageBus | Envelopes> =>
	Effect.gen(function* () {
		const bus = yield* MessageBus
		const envelopes = yield* Envelopes

		const reply = (answer: Effect.Effect<Envelope.Type>) =>
			Option.match(envelope.replyEndpoint, {
				onNone: () => Effect.logDebug('No reply endpoint, answer not sent', { cmd: envelope.cmd, id: envelope.id }),
				onSome: (to) => answer.pipe(Effect.flatMap((message) => bus.publish(to, message))),
			})

		yield* Effect.logDebug('Command received', { cmd: envelope.cmd, id: envelope.id, reply: envelope.reply })

		const decision = yield* decode(commands, envelope).pipe(Effect.flatMap(handler), Effect.either)

		if (Either.isLeft(decision)) {
			yield* Effect.logWarning('Command rejected', {
				cmd: envelope.cmd,
				code: decision.left.code,
				id: envelope.id,
				message: decision.left.message,
			})
			return yield* reply(envelopes.ack(envelope, Option.some(decision.left)))
		}

		yield* reply(envelopes.ack(envelope, Option.none()))

		const outcome = yield* Effect.either(decision.right)

		if (Either.isLeft(outcome)) {
			yield* Effect.logWarning('Command failed', {
				cmd: envelope.cmd,
				code: outcome.left.code,
				id: envelope.id,
				message: outcome.left.message,
			})
		}

		yield* reply(envelopes.result(envelope, outcome))
	}).pipe(Effect.withSpan('CommandResponder.respond', { attributes: { cmd: envelope.cmd, id: envelope.id } }))
