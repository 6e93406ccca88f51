/**
 * Order-preserving access to raw JSON objects
 */

export * from './raw-json.ts'
