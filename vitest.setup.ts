import { addEqualityTesters } from '@effect/vitest'

// Structural equality for Data classes, Option and DateTime in `toEqual`
addEqualityTesters()
