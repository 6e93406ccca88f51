/**
 * Platform: Ambient services shared by the codec packages
 *
 * - {@link CodecConfig}: codec settings from configuration
 * - {@link Logging}: logger layers
 */

import type { ConfigError } from 'effect/ConfigError'
import * as Layer from 'effect/Layer'

import { CodecConfig } from './config/index.ts'
import { Logging } from './logging/index.ts'

export * from './config/index.ts'
export * from './logging/index.ts'

export class Platform {
	/**
	 * Production composition: {@link CodecConfig.Live} with {@link Logging.Live}
	 */
	static readonly Live: Layer.Layer<CodecConfig, ConfigError> = Layer.merge(CodecConfig.Live, Logging.Live)
}
