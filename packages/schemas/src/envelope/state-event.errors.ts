/**
 * Envelope codec errors
 *
 * The decoder stops at the first problem it finds; every error names the wire field it is about.
 */

import * as Schema from 'effect/Schema'

import type { ContentError } from '../content/index.ts'
import type { MalformedJsonError } from '../json/index.ts'
import type { TimestampOverflowError } from '../timestamp/index.ts'

export { ContentError } from '../content/index.ts'
export { MalformedJsonError } from '../json/index.ts'
export { TimestampOverflowError } from '../timestamp/index.ts'

/**
 * MissingFieldError: A required wire field never appeared
 */
export class MissingFieldError extends Schema.TaggedError<MissingFieldError>()('MissingFieldError', {
	field: Schema.String,
}) {}

/**
 * DuplicateFieldError: A recognized field appeared more than once
 *
 * Raised whether or not the repeated values are equal.
 */
export class DuplicateFieldError extends Schema.TaggedError<DuplicateFieldError>()('DuplicateFieldError', {
	field: Schema.String,
}) {}

/**
 * InvalidFieldError: A recognized field holds a value of the wrong shape
 */
export class InvalidFieldError extends Schema.TaggedError<InvalidFieldError>()('InvalidFieldError', {
	field: Schema.String,
	/** Rendered parse failure */
	details: Schema.String,
}) {}

/**
 * UnknownFieldError: An unrecognized field, under the `'error'` excess property policy
 */
export class UnknownFieldError extends Schema.TaggedError<UnknownFieldError>()('UnknownFieldError', {
	field: Schema.String,
}) {}

export type StateEventDecodeError =
	| MalformedJsonError
	| MissingFieldError
	| DuplicateFieldError
	| InvalidFieldError
	| UnknownFieldError
	| ContentError
	| TimestampOverflowError

export type StateEventEncodeError = TimestampOverflowError | ContentError | InvalidFieldError
