export * from './any-state-event.ts'
export * from './content/aliases-event-content.schema.ts'
export * from './content/any-state-event-content.ts'
export * from './content/avatar-event-content.schema.ts'
export * from './content/name-event-content.schema.ts'
export * from './content/topic-event-content.schema.ts'
