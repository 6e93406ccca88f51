/**
 * CodecConfig: Runtime settings for the state event codec
 *
 * Environment variables:
 *
 * - `STATE_EVENT_EXCESS_PROPERTY`: `ignore` (default) or `error`. Policy for top-level keys the envelope does not
 *   recognize. `ignore` keeps decoding forward compatible; `error` rejects them.
 * - `STATE_EVENT_BATCH_CONCURRENCY`: positive integer (default `8`). Upper bound on envelopes decoded or encoded at
 *   the same time by the batch codec.
 *
 * Read once when the layer is built. Tests use {@link CodecConfig.Test} instead of environment variables.
 */

import * as Config from 'effect/Config'
import type { ConfigError } from 'effect/ConfigError'
import * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

/**
 * What the decoder does with an unrecognized top-level key
 *
 * Named after `onExcessProperty` of `effect/SchemaAST` parse options.
 */
export type ExcessPropertyPolicy = 'ignore' | 'error'

export const DEFAULT_BATCH_CONCURRENCY = 8

/**
 * Config descriptor for {@link CodecConfig}, exported so callers can compose it into their own config.
 */
export const CodecConfigFromEnv: Config.Config<CodecConfig.Type> = Config.all({
	batchConcurrency: Config.integer('STATE_EVENT_BATCH_CONCURRENCY').pipe(
		Config.validate({
			message: 'STATE_EVENT_BATCH_CONCURRENCY must be a positive integer',
			validation: (n: number) => n > 0,
		}),
		Config.withDefault(DEFAULT_BATCH_CONCURRENCY),
	),
	excessProperty: Config.literal('ignore', 'error')('STATE_EVENT_EXCESS_PROPERTY').pipe(Config.withDefault('ignore')),
})

export class CodecConfig extends Context.Tag('@room-state/platform/CodecConfig')<
	CodecConfig,
	{
		readonly excessProperty: ExcessPropertyPolicy
		readonly batchConcurrency: number
	}
>() {
	/**
	 * Production layer: settings from the active `ConfigProvider` (environment variables by default)
	 */
	static readonly Live: Layer.Layer<CodecConfig, ConfigError> = Layer.effect(
		CodecConfig,
		Effect.gen(function* () {
			const config = yield* CodecConfigFromEnv

			yield* Effect.logDebug('Codec configuration loaded', {
				batchConcurrency: config.batchConcurrency,
				excessProperty: config.excessProperty,
			})

			return CodecConfig.of(config)
		}),
	)

	/**
	 * Test layer: defaults, overridden field by field
	 *
	 * @example
	 *
	 * ```typescript
	 * program.pipe(Effect.provide(CodecConfig.Test({ excessProperty: 'error' })))
	 * ```
	 */
	static readonly Test = (overrides: Partial<CodecConfig.Type> = {}): Layer.Layer<CodecConfig> =>
		Layer.succeed(
			CodecConfig,
			CodecConfig.of({
				batchConcurrency: DEFAULT_BATCH_CONCURRENCY,
				excessProperty: 'ignore',
				...overrides,
			}),
		)
}

export declare namespace CodecConfig {
	type Type = Context.Tag.Service<CodecConfig>
}
