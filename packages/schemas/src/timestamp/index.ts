/**
 * Timestamp codec for `origin_server_ts`
 */

export * from './origin-server-ts.ts'
