import { describe, expect, it } from '@effect/vitest'
import * as DateTime from 'effect/DateTime'
import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Equal from 'effect/Equal'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'

import { CodecConfig } from '@room-state/platform/config'
import { Logging } from '@room-state/platform/logging'

import { makeUnsignedData } from '../shared/index.ts'
import { FixtureContentCodec, LabelContent } from '../test/content.fixture.ts'
import { labelEvent, labelWire, objectText } from '../test/state-event.fixture.ts'
import { makeStateEventCodec } from './state-event.codec.ts'
import { StateEvent } from './state-event.ts'

const codec = makeStateEventCodec(FixtureContentCodec)

const canonicalText = JSON.stringify(labelWire)

describe('makeStateEventCodec', () => {
	describe('decodeJson', () => {
		it.effect('decodes an event', () =>
			Effect.gen(function* () {
				const event = yield* codec.decodeJson(canonicalText)

				expect(event).toEqual(labelEvent)
			}),
		)

		it.effect('fails with the decoder error', () =>
			Effect.gen(function* () {
				const error = yield* Effect.flip(codec.decodeJson('{"type":"test.label"}'))

				expect(error).toMatchObject({ _tag: 'MissingFieldError', field: 'content' })
			}),
		)

		it.effect('passes the excess property policy through', () =>
			Effect.gen(function* () {
				const text = JSON.stringify({ ...labelWire, extra: 1 })
				const error = yield* Effect.flip(codec.decodeJson(text, { onExcessProperty: 'error' }))

				expect(error).toMatchObject({ _tag: 'UnknownFieldError', field: 'extra' })
			}),
		)
	})

	describe('decodeUnknown', () => {
		it.effect('decodes an already parsed object', () =>
			Effect.gen(function* () {
				expect(yield* codec.decodeUnknown({ ...labelWire })).toEqual(labelEvent)
			}),
		)

		it('rejects values that are not objects', () => {
			const result = codec.decodeUnknownEither(['not', 'an', 'object'])

			expect(Either.isLeft(result) && result.left._tag).toBe('MalformedJsonError')
		})
	})

	describe('encoding', () => {
		it.effect('encodes to the wire object', () =>
			Effect.gen(function* () {
				expect(yield* codec.encode(labelEvent)).toEqual(labelWire)
			}),
		)

		it.effect('serializes to canonical JSON text', () =>
			Effect.gen(function* () {
				expect(yield* codec.encodeJson(labelEvent)).toBe(
					'{"type":"test.label","content":{"label":"lobby"},"event_id":"$ev1:example.org","sender":"@alice:example.org","origin_server_ts":1700000000000,"room_id":"!room:example.org","state_key":""}',
				)
			}),
		)

		it('fails synchronously with encodeEither', () => {
			const event = new StateEvent({ ...labelEvent, originServerTs: DateTime.unsafeMake(-5) })

			expect(Either.isLeft(codec.encodeEither(event))).toBe(true)
		})
	})

	describe('round trip', () => {
		it.effect('decode(encode(event)) equals the event', () =>
			Effect.gen(function* () {
				const event = new StateEvent({
					...labelEvent,
					prevContent: Option.some(new LabelContent({ label: 'hall' })),
					stateKey: 'topic',
					unsigned: makeUnsignedData({
						age: 99,
						'org.example.relations': { parents: [{ event_id: '$ev0:example.org' }] },
						transaction_id: 'txn-7',
						via: ['example.org'],
					}),
				})

				const text = yield* codec.encodeJson(event)

				expect(yield* codec.decodeJson(text)).toEqual(event)
			}),
		)

		it.effect('decode(encode(event)) is Equal.equals to the event', () =>
			Effect.gen(function* () {
				const event = new StateEvent({
					...labelEvent,
					prevContent: Option.some(new LabelContent({ label: 'hall' })),
					unsigned: makeUnsignedData({ age: 7, nested: { list: [[1], [2]] }, via: ['a.example.org', 'b.example.org'] }),
				})

				const decoded = yield* codec.encode(event).pipe(Effect.flatMap(codec.decodeUnknown))

				expect(Equal.equals(decoded, event)).toBe(true)
			}),
		)

		it.effect('re-encoding a decoded event yields canonical key order', () =>
			Effect.gen(function* () {
				const shuffled = objectText(
					['state_key', ''],
					['room_id', '!room:example.org'],
					['content', { label: 'lobby' }],
					['origin_server_ts', 1_700_000_000_000],
					['sender', '@alice:example.org'],
					['type', 'test.label'],
					['event_id', '$ev1:example.org'],
				)

				expect(yield* codec.decodeJson(shuffled).pipe(Effect.flatMap(codec.encodeJson))).toBe(canonicalText)
			}),
		)
	})

	describe('batches', () => {
		const TestLayer = (overrides: Partial<CodecConfig.Type> = {}) =>
			Layer.merge(CodecConfig.Test(overrides), Logging.Silent)

		it.effect('decodes every input in order and isolates failures', () =>
			Effect.gen(function* () {
				const results = yield* codec.decodeBatch([canonicalText, '{', canonicalText, '{}'])

				expect(results.map((result) => (Either.isRight(result) ? 'ok' : result.left._tag))).toEqual([
					'ok',
					'MalformedJsonError',
					'ok',
					'MissingFieldError',
				])
				expect(results[0]).toEqual(Either.right(labelEvent))
			}).pipe(Effect.provide(TestLayer({ batchConcurrency: 2 }))),
		)

		it.effect('applies the configured excess property policy', () =>
			Effect.gen(function* () {
				const results = yield* codec.decodeBatch([JSON.stringify({ ...labelWire, extra: true })])

				expect(results.map(Either.isLeft)).toEqual([true])
			}).pipe(Effect.provide(TestLayer({ excessProperty: 'error' }))),
		)

		it.effect('encodes every input in order', () =>
			Effect.gen(function* () {
				const beforeEpoch = new StateEvent({ ...labelEvent, originServerTs: DateTime.unsafeMake(-1) })
				const results = yield* codec.encodeBatch([labelEvent, beforeEpoch, labelEvent])

				expect(results.map((result) => (Either.isRight(result) ? result.right : result.left._tag))).toEqual([
					canonicalText,
					'TimestampOverflowError',
					canonicalText,
				])
			}).pipe(Effect.provide(TestLayer({ batchConcurrency: 1 }))),
		)

		it.effect('returns an empty result for an empty batch', () =>
			Effect.gen(function* () {
				expect(yield* codec.decodeBatch([])).toEqual([])
			}).pipe(Effect.provide(TestLayer())),
		)
	})
})
