/**
 * Shared foundational schemas
 *
 * Branded identifiers and the unsigned side-channel carried by every event.
 */

export * from './event-id.schema.ts'
export * from './identifier.schema.ts'
export * from './room-alias-id.schema.ts'
export * from './room-id.schema.ts'
export * from './unsigned-data.schema.ts'
export * from './user-id.schema.ts'
