export * from './state-event-content.ts'
