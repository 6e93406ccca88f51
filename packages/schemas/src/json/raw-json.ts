/**
 * Raw JSON: Top-level object entries in source order, values kept as text
 *
 * `JSON.parse` resolves duplicate keys by last-write-wins and forgets key order. The envelope decoder needs both: a
 * repeated key is a protocol error, and `content` can only be interpreted once `type` is known, wherever `type` sits.
 * This module reads the syntax tree instead (`jsonc-parser` in strict mode: no comments, no trailing commas) and
 * hands every top-level entry over with the exact text of its value.
 */

import * as Data from 'effect/Data'
import * as Either from 'effect/Either'
import * as Predicate from 'effect/Predicate'
import * as Schema from 'effect/Schema'
import { type Node, type ParseError, parseTree, printParseErrorCode } from 'jsonc-parser'

/**
 * MalformedJsonError: Input is not a syntactically valid JSON object
 */
export class MalformedJsonError extends Schema.TaggedError<MalformedJsonError>()('MalformedJsonError', {
	details: Schema.String,
}) {}

/**
 * RawJson: The unparsed source text of one JSON value
 */
export class RawJson extends Data.Class<{ readonly text: string }> {}

/**
 * One top-level `"key": value` pair
 */
export interface RawEntry {
	readonly key: string
	readonly value: RawJson
}

const describeErrors = (text: string, errors: ReadonlyArray<ParseError>): string =>
	errors
		.map(({ error, offset }) => `${printParseErrorCode(error)} at offset ${offset} near ${JSON.stringify(text.slice(offset, offset + 16))}`)
		.join('; ')

const toEntry = (text: string, property: Node): Either.Either<RawEntry, MalformedJsonError> => {
	const [keyNode, valueNode] = property.children ?? []

	if (keyNode === undefined || valueNode === undefined || typeof keyNode.value !== 'string') {
		return Either.left(new MalformedJsonError({ details: `Incomplete property at offset ${property.offset}` }))
	}

	return Either.right({
		key: keyNode.value,
		value: new RawJson({ text: text.slice(valueNode.offset, valueNode.offset + valueNode.length) }),
	})
}

/**
 * Reads the top-level entries of a JSON object, duplicates included, in the order they appear
 */
export const objectEntries = (text: string): Either.Either<ReadonlyArray<RawEntry>, MalformedJsonError> => {
	const errors: Array<ParseError> = []
	const root = parseTree(text, errors, { allowEmptyContent: false, allowTrailingComma: false, disallowComments: true })

	if (errors.length > 0) {
		return Either.left(new MalformedJsonError({ details: describeErrors(text, errors) }))
	}

	if (root === undefined || root.type !== 'object') {
		return Either.left(
			new MalformedJsonError({ details: `Expected a JSON object, got ${root === undefined ? 'nothing' : root.type}` }),
		)
	}

	return Either.all((root.children ?? []).map((property) => toEntry(text, property)))
}

/**
 * Serializes an in-memory record so that it can go through {@link objectEntries}
 *
 * Keys whose value is `undefined` disappear, exactly as they would on the wire.
 */
export const fromUnknown = (value: unknown): Either.Either<string, MalformedJsonError> => {
	if (!Predicate.isRecord(value)) {
		return Either.left(new MalformedJsonError({ details: 'Expected a JSON object' }))
	}

	return Either.try({
		catch: (cause) => new MalformedJsonError({ details: `Value is not serializable: ${String(cause)}` }),
		try: () => JSON.stringify(value),
	})
}
