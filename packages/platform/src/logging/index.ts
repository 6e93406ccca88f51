/**
 * Logger layers
 */

export * from './logging.ts'
