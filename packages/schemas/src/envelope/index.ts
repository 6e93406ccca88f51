/**
 * State event envelope: decoder, encoder and the codec that binds them to a content codec
 */

export * from './state-event.codec.ts'
export * from './state-event.decoder.ts'
export * from './state-event.encoder.ts'
export * from './state-event.errors.ts'
export * from './state-event.ts'
