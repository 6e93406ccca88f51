import { describe, expect, it } from '@effect/vitest'
import * as ConfigProvider from 'effect/ConfigProvider'
import * as Effect from 'effect/Effect'
import * as Exit from 'effect/Exit'

import { CodecConfig, DEFAULT_BATCH_CONCURRENCY } from './codec-config.ts'

const withEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
	Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))

describe('CodecConfig', () => {
	describe('Live', () => {
		it.effect('uses defaults when nothing is configured', () =>
			Effect.gen(function* () {
				const config = yield* CodecConfig

				expect(config.excessProperty).toBe('ignore')
				expect(config.batchConcurrency).toBe(DEFAULT_BATCH_CONCURRENCY)
			}).pipe(Effect.provide(CodecConfig.Live), withEnv([])),
		)

		it.effect('reads both settings from the config provider', () =>
			Effect.gen(function* () {
				const config = yield* CodecConfig

				expect(config.excessProperty).toBe('error')
				expect(config.batchConcurrency).toBe(2)
			}).pipe(
				Effect.provide(CodecConfig.Live),
				withEnv([
					['STATE_EVENT_EXCESS_PROPERTY', 'error'],
					['STATE_EVENT_BATCH_CONCURRENCY', '2'],
				]),
			),
		)

		it.effect('rejects an unknown excess property policy', () =>
			Effect.gen(function* () {
				const result = yield* Effect.exit(
					CodecConfig.pipe(
						Effect.provide(CodecConfig.Live),
						withEnv([['STATE_EVENT_EXCESS_PROPERTY', 'preserve']]),
					),
				)

				expect(Exit.isFailure(result)).toBe(true)
			}),
		)

		it.effect('rejects a batch concurrency below one', () =>
			Effect.gen(function* () {
				const result = yield* Effect.exit(
					CodecConfig.pipe(Effect.provide(CodecConfig.Live), withEnv([['STATE_EVENT_BATCH_CONCURRENCY', '0']])),
				)

				expect(Exit.isFailure(result)).toBe(true)
			}),
		)
	})

	describe('Test', () => {
		it.effect('overrides only the given fields', () =>
			Effect.gen(function* () {
				const config = yield* CodecConfig

				expect(config).toEqual({ batchConcurrency: DEFAULT_BATCH_CONCURRENCY, excessProperty: 'error' })
			}).pipe(Effect.provide(CodecConfig.Test({ excessProperty: 'error' }))),
		)
	})
})
