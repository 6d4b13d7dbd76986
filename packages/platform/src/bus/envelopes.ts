import * as DateTime from 'effect/DateTime'
import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Option from 'effect/Option'
import * as Ref from 'effect/Ref'

import {
	AckEnvelope,
	CommandEnvelope,
	EventEnvelope,
	type Payload,
	ResultEnvelope,
} from '@hearo/schemas/envelope'
import type { Wire } from '@hearo/schemas/messages'
import { type EndpointName, EnvelopeId, ErrorInfo } from '@hearo/schemas/shared'

import { DaemonIdentity } from '../daemon/daemon-identity.ts'
import type { CommandFailed, CommandRejected } from '../errors.ts'

/**
 * Envelopes - Builds envelopes stamped with this process' identity and clock
 *
 * Ids are `<kind>-<daemon>-<counter>` with one monotonic counter per process.
 */
export class Envelopes extends Effect.Service<Envelopes>()('@hearo/platform/bus/Envelopes', {
	effect: Effect.gen(function* () {
		const identity = yield* DaemonIdentity
		const counter = yield* Ref.make(0)

		const header = (kind: EnvelopeId.Kind) =>
			Effect.all({
				id: Ref.updateAndGet(counter, (n) => n + 1).pipe(
					Effect.map((n) => EnvelopeId.format(kind, identity.id, n)),
				),
				ts: DateTime.now,
				v: Effect.succeed(1 as const),
			})

		const toErrorInfo = (error: CommandRejected | CommandFailed) =>
			new ErrorInfo({ code: error.code, message: error.message })

		return {
			/**
			 * Acknowledges `command`: accepted when `rejection` is none.
			 */
			ack: (command: CommandEnvelope, rejection: Option.Option<CommandRejected>) =>
				header('ack').pipe(
					Effect.map(
						(h) =>
							new AckEnvelope({
								...h,
								correlatesTo: command.id,
								error: Option.map(rejection, toErrorInfo),
								ok: Option.isNone(rejection),
							}),
					),
				),

			command: (message: Wire.WireMessage, options: { readonly reply?: EndpointName.Type; readonly timeoutMs?: number } = {}) =>
				header('cmd').pipe(
					Effect.map(
						(h) =>
							new CommandEnvelope({
								...h,
								cmd: message.name,
								payload: message.payload,
								reply: options.reply ?? '',
								timeoutMs: options.timeoutMs ?? 1000,
							}),
					),
				),

			event: (message: Wire.WireMessage) =>
				header('evt').pipe(
					Effect.map((h) => new EventEnvelope({ ...h, event: message.name, payload: message.payload })),
				),

			/**
			 * Result of an accepted `command`: its payload on success, its error otherwise.
			 */
			result: (command: CommandEnvelope, outcome: Either.Either<Payload.Type, CommandFailed>) =>
				header('res').pipe(
					Effect.map(
						(h) =>
							new ResultEnvelope({
								...h,
								correlatesTo: command.id,
								error: Either.match(outcome, {
									onLeft: (failure) => Option.some(toErrorInfo(failure)),
									onRight: () => Option.none(),
								}),
								ok: Either.isRight(outcome),
								payload: Either.getOrElse(outcome, (): Payload.Type => ({})),
							}),
					),
				),
		}
	}),
}) {}
