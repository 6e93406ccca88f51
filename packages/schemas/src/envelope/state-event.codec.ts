/**
 * State event codec: Decoder and encoder bound to one content codec
 *
 * Every operation comes in two flavours: synchronous `*Either` functions, and `Effect`s that never suspend and log
 * failures at debug level. The batch operations read their concurrency and excess property policy from
 * {@link CodecConfig}.
 */

import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import { pipe } from 'effect/Function'

import { CodecConfig } from '@room-state/platform/config'

import type { StateEventContent, StateEventContentCodec } from '../content/index.ts'
import { fromUnknown, objectEntries } from '../json/index.ts'
import { type DecodeOptions, decodeEntries } from './state-event.decoder.ts'
import { encodeStateEvent } from './state-event.encoder.ts'
import type { StateEventDecodeError, StateEventEncodeError } from './state-event.errors.ts'
import type { StateEvent } from './state-event.ts'

export interface StateEventCodec<C extends StateEventContent> {
	readonly decodeJson: (text: string, options?: DecodeOptions) => Effect.Effect<StateEvent<C>, StateEventDecodeError>
	readonly decodeJsonEither: (
		text: string,
		options?: DecodeOptions,
	) => Either.Either<StateEvent<C>, StateEventDecodeError>

	/**
	 * Decodes an already parsed value. Duplicate keys cannot be detected any more at this point.
	 */
	readonly decodeUnknown: (value: unknown, options?: DecodeOptions) => Effect.Effect<StateEvent<C>, StateEventDecodeError>
	readonly decodeUnknownEither: (
		value: unknown,
		options?: DecodeOptions,
	) => Either.Either<StateEvent<C>, StateEventDecodeError>

	readonly encode: (event: StateEvent<C>) => Effect.Effect<StateEvent.Encoded, StateEventEncodeError>
	readonly encodeEither: (event: StateEvent<C>) => Either.Either<StateEvent.Encoded, StateEventEncodeError>
	readonly encodeJson: (event: StateEvent<C>) => Effect.Effect<string, StateEventEncodeError>

	/**
	 * Decodes independent envelopes; one result per input, in input order
	 */
	readonly decodeBatch: (
		texts: Iterable<string>,
	) => Effect.Effect<Array<Either.Either<StateEvent<C>, StateEventDecodeError>>, never, CodecConfig>

	/**
	 * Encodes independent envelopes to JSON text; one result per input, in input order
	 */
	readonly encodeBatch: (
		events: Iterable<StateEvent<C>>,
	) => Effect.Effect<Array<Either.Either<string, StateEventEncodeError>>, never, CodecConfig>
}

const logRejection = (operation: string) => (error: { readonly _tag: string }) =>
	Effect.logDebug('State event rejected', { error: error._tag, operation })

const logBatch = <A, E>(operation: string, results: Array<Either.Either<A, E>>) => {
	const failed = results.filter(Either.isLeft).length

	return failed > 0
		? Effect.logWarning('State event batch had failures', { failed, operation, total: results.length })
		: Effect.logDebug('State event batch complete', { operation, total: results.length })
}

export const makeStateEventCodec = <C extends StateEventContent>(
	contentCodec: StateEventContentCodec<C>,
): StateEventCodec<C> => {
	const fromEntries = decodeEntries(contentCodec)
	const toWire = encodeStateEvent(contentCodec)

	const decodeJsonEither = (text: string, options?: DecodeOptions) =>
		Either.flatMap(objectEntries(text), (entries) => fromEntries(entries, options))

	const decodeUnknownEither = (value: unknown, options?: DecodeOptions) =>
		Either.flatMap(fromUnknown(value), (text) => decodeJsonEither(text, options))

	const encodeJsonEither = (event: StateEvent<C>) => Either.map(toWire(event), (wire) => JSON.stringify(wire))

	const decodeJson = (text: string, options?: DecodeOptions): Effect.Effect<StateEvent<C>, StateEventDecodeError> =>
		pipe(
			Effect.suspend(() => decodeJsonEither(text, options)),
			Effect.tapError(logRejection('decode')),
			Effect.withLogSpan('state-event.decode'),
		)

	const encodeJson = (event: StateEvent<C>): Effect.Effect<string, StateEventEncodeError> =>
		pipe(
			Effect.suspend(() => encodeJsonEither(event)),
			Effect.tapError(logRejection('encode')),
			Effect.withLogSpan('state-event.encode'),
		)

	return {
		decodeBatch: (texts) =>
			Effect.gen(function* () {
				const config = yield* CodecConfig
				const results = yield* Effect.forEach(
					texts,
					(text) => Effect.either(decodeJson(text, { onExcessProperty: config.excessProperty })),
					{ concurrency: config.batchConcurrency },
				)

				yield* logBatch('decode', results)

				return results
			}),
		decodeJson,
		decodeJsonEither,
		decodeUnknown: (value, options) =>
			pipe(
				Effect.suspend(() => decodeUnknownEither(value, options)),
				Effect.tapError(logRejection('decode')),
				Effect.withLogSpan('state-event.decode'),
			),
		decodeUnknownEither,
		encode: (event) =>
			pipe(
				Effect.suspend(() => toWire(event)),
				Effect.tapError(logRejection('encode')),
				Effect.withLogSpan('state-event.encode'),
			),
		encodeBatch: (events) =>
			Effect.gen(function* () {
				const { batchConcurrency } = yield* CodecConfig
				const results = yield* Effect.forEach(events, (event) => Effect.either(encodeJson(event)), {
					concurrency: batchConcurrency,
				})

				yield* logBatch('encode', results)

				return results
			}),
		encodeEither: toWire,
		encodeJson,
	}
}
