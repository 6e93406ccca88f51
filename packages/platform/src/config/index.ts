/**
 * Codec configuration
 */

export * from './codec-config.ts'
