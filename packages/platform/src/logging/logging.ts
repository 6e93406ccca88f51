/**
 * Logging: Logger layers for processes embedding the codec
 *
 * The codec itself only calls `Effect.logDebug` / `Effect.logWarning`; these layers decide where those lines go.
 *
 * Environment variables:
 *
 * - `LOG_FORMAT`: `pretty` (default), `json` or `logfmt`
 * - `LOG_LEVEL`: minimum level, any `effect/LogLevel` label (default `Info`)
 */

import * as Config from 'effect/Config'
import type { ConfigError } from 'effect/ConfigError'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Logger from 'effect/Logger'
import * as LogLevel from 'effect/LogLevel'

export type LogFormat = 'pretty' | 'json' | 'logfmt'

const formats: Record<LogFormat, Layer.Layer<never>> = {
	json: Logger.json,
	logfmt: Logger.logFmt,
	pretty: Logger.pretty,
}

export const LoggingConfigFromEnv: Config.Config<{ readonly format: LogFormat; readonly level: LogLevel.LogLevel }> =
	Config.all({
		format: Config.literal('pretty', 'json', 'logfmt')('LOG_FORMAT').pipe(Config.withDefault('pretty')),
		level: Config.logLevel('LOG_LEVEL').pipe(Config.withDefault(LogLevel.Info)),
	})

export class Logging {
	/**
	 * Builds the logger layer for a given format and minimum level
	 */
	static readonly layer = (format: LogFormat, level: LogLevel.LogLevel): Layer.Layer<never> =>
		Layer.merge(formats[format], Logger.minimumLogLevel(level))

	/**
	 * Production layer: format and level from the active `ConfigProvider`
	 */
	static readonly Live: Layer.Layer<never, ConfigError> = Layer.unwrapEffect(
		Effect.map(LoggingConfigFromEnv, ({ format, level }) => Logging.layer(format, level)),
	)

	/**
	 * Test layer: drops every log line
	 */
	static readonly Silent: Layer.Layer<never> = Logger.remove(Logger.defaultLogger)
}
