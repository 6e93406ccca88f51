/**
 * Identifier: Base schema for sigil-prefixed protocol identifiers
 *
 * Every identifier is `<sigil><localpart>:<server name>`, at most 255 characters. The localpart is non-empty and
 * contains no `:`; the server name is non-empty and contains no whitespace (it may carry a port, or be an IPv6 literal).
 *
 * Event IDs are the exception: since room version 3 they are an opaque hash without a server name, so the event ID
 * schema accepts both shapes.
 */

import * as Schema from 'effect/Schema'

export const MAX_IDENTIFIER_LENGTH = 255

const escapeSigil = (sigil: string): string => sigil.replace(/[$^\\.*+?()[\]{}|]/g, '\\$&')

/**
 * Builds the unbranded schema for one identifier kind
 *
 * @param sigil - Leading character (`!`, `$`, `@`, `#`)
 * @param title - Schema title, used in parse error output
 * @param options.opaque - Also accept `<sigil><url-safe base64>` without a server name
 */
export const Identifier = (sigil: string, title: string, options: { readonly opaque?: boolean } = {}) => {
	const qualified = `${escapeSigil(sigil)}[^:\\s]+:\\S+`
	const shape = options.opaque === true ? `(?:${qualified}|${escapeSigil(sigil)}[A-Za-z0-9+/_=-]+)` : qualified

	return Schema.String.pipe(
		Schema.maxLength(MAX_IDENTIFIER_LENGTH, {
			message: () => `${title} must be at most ${MAX_IDENTIFIER_LENGTH} characters`,
		}),
		Schema.pattern(new RegExp(`^${shape}$`), {
			description: `${sigil}-prefixed identifier`,
			message: () => `Invalid ${title}. Expected: ${sigil}localpart:server.name`,
			title,
		}),
	)
}
