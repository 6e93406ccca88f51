import { describe, expect, it } from '@effect/vitest'
import * as DateTime from 'effect/DateTime'
import * as Either from 'effect/Either'
import * as Option from 'effect/Option'

import { makeUnsignedData } from '../shared/index.ts'
import { CounterContent, FixtureContentCodec, LabelContent } from '../test/content.fixture.ts'
import { labelEvent, labelWire } from '../test/state-event.fixture.ts'
import { MAX_TIMESTAMP_MS } from '../timestamp/index.ts'
import { encodeStateEvent } from './state-event.encoder.ts'
import { StateEvent } from './state-event.ts'

const encode = encodeStateEvent(FixtureContentCodec)

const wireOf = (event: typeof labelEvent) =>
	Either.getOrThrowWith(encode(event), (error) => new Error(`Expected encoding to succeed: ${error._tag}`))

const failureOf = (event: typeof labelEvent) =>
	Either.getOrThrowWith(Either.flip(encode(event)), () => new Error('Expected encoding to fail'))

const REQUIRED_KEYS = ['type', 'content', 'event_id', 'sender', 'origin_server_ts', 'room_id', 'state_key']

describe('encodeStateEvent', () => {
	it('writes the required fields with type taken from the content', () => {
		expect(wireOf(labelEvent)).toEqual(labelWire)
	})

	it('writes keys in canonical order', () => {
		expect(Object.keys(wireOf(labelEvent))).toEqual(REQUIRED_KEYS)
	})

	it('omits an absent prev_content and an empty unsigned', () => {
		const wire = wireOf(labelEvent)

		expect('prev_content' in wire).toBe(false)
		expect('unsigned' in wire).toBe(false)
	})

	it('appends prev_content and unsigned when present', () => {
		const event = new StateEvent({
			...labelEvent,
			prevContent: Option.some(new LabelContent({ label: 'hall' })),
			unsigned: { age: 10, custom: true },
		})
		const wire = wireOf(event)

		expect(Object.keys(wire)).toEqual([...REQUIRED_KEYS, 'prev_content', 'unsigned'])
		expect(wire.prev_content).toEqual({ label: 'hall' })
		expect(wire.unsigned).toEqual({ age: 10, custom: true })
	})

	it('writes structurally built unsigned data as plain JSON', () => {
		const event = new StateEvent({
			...labelEvent,
			unsigned: makeUnsignedData({ age: 10, custom: { tags: ['a', 'b'] } }),
		})

		expect(JSON.stringify(wireOf(event).unsigned)).toBe('{"age":10,"custom":{"tags":["a","b"]}}')
	})

	it('writes the epoch and the largest instant', () => {
		expect(wireOf(new StateEvent({ ...labelEvent, originServerTs: DateTime.unsafeMake(0) })).origin_server_ts).toBe(0)
		expect(
			wireOf(new StateEvent({ ...labelEvent, originServerTs: DateTime.unsafeMake(MAX_TIMESTAMP_MS) })).origin_server_ts,
		).toBe(MAX_TIMESTAMP_MS)
	})

	it('rejects an instant before the epoch', () => {
		const event = new StateEvent({ ...labelEvent, originServerTs: DateTime.unsafeMake(-1) })

		expect(failureOf(event)).toMatchObject({ _tag: 'TimestampOverflowError', millis: -1 })
	})

	it('rejects prev_content of another event type', () => {
		const event = new StateEvent({ ...labelEvent, prevContent: Option.some(new CounterContent({ count: 1 })) })

		expect(failureOf(event)).toMatchObject({
			_tag: 'ContentError',
			eventType: 'test.counter',
			reason: 'InvalidContent',
		})
	})

	it('rejects unsigned data with an ill-typed well-known key', () => {
		const event = new StateEvent({ ...labelEvent, unsigned: { age: 1.5 } })

		expect(failureOf(event)).toMatchObject({ _tag: 'InvalidFieldError', field: 'unsigned' })
	})
})
