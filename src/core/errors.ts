// CHANGE: Typed conversion error ADT using Effect.Data
// WHY: Codecs report failures as values; the dispatcher turns them into the response envelope
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`, message is what callers see
// COMPLEXITY: O(1)

import { Data } from "effect";

import type { Radix } from "./models.js";

/**
 * Unknown inputType / outputType label.
 *
 * @pure true (Data class)
 * @invariant message ∈ {"Invalid input type", "Invalid output type"}
 */
export class InvalidTypeError extends Data.TaggedError("InvalidTypeError")<{
	readonly side: "input" | "output";
	readonly label: string;
	readonly message: string;
}> {}

/**
 * Text token is not one of the recognised number words.
 *
 * @pure true (Data class)
 */
export class TextConversionError extends Data.TaggedError(
	"TextConversionError",
)<{
	readonly text: string;
	readonly message: string;
}> {}

/**
 * Literal contains characters outside the digit set of its radix.
 *
 * @pure true (Data class)
 * @invariant message mentions both radix and literal
 */
export class RadixParseError extends Data.TaggedError("RadixParseError")<{
	readonly literal: string;
	readonly radix: Radix;
	readonly message: string;
}> {}

/**
 * Malformed base64 payload (alphabet, padding or length).
 *
 * @pure true (Data class)
 */
export class Base64DecodeError extends Data.TaggedError("Base64DecodeError")<{
	readonly input: string;
	readonly message: string;
}> {}

/**
 * Value cannot be represented as unsigned big-endian bytes.
 *
 * @pure true (Data class)
 */
export class Base64EncodeError extends Data.TaggedError("Base64EncodeError")<{
	readonly value: bigint;
	readonly message: string;
}> {}

/**
 * Request body does not have the `{ input, inputType, outputType }` shape.
 *
 * @pure true (Data class)
 */
export class InvalidRequestError extends Data.TaggedError(
	"InvalidRequestError",
)<{
	readonly message: string;
}> {}

/**
 * Request body exceeded the configured size limit.
 */
export class BodyTooLargeError extends Data.TaggedError("BodyTooLargeError")<{
	readonly limit: number;
	readonly message: string;
}> {}

/**
 * Request stream failed before the body was complete.
 */
export class RequestStreamError extends Data.TaggedError("RequestStreamError")<{
	readonly message: string;
}> {}

/**
 * HTTP server could not listen or close.
 */
export class ServerError extends Data.TaggedError("ServerError")<{
	readonly message: string;
}> {}

// CHANGE: Smart constructors keep message text in one place
// INVARIANT: ∀ e constructed here: e.message is the exact text surfaced to clients

export const invalidType = (
	side: "input" | "output",
	label: string,
): InvalidTypeError =>
	new InvalidTypeError({
		side,
		label,
		message: side === "input" ? "Invalid input type" : "Invalid output type",
	});

export const textConversionError = (text: string): TextConversionError =>
	new TextConversionError({
		text,
		message: "Unable to convert text to number",
	});

/**
 * Quote a literal for an error message.
 *
 * Single quotes unless the literal holds a single quote and no double quote;
 * backslash, newline, carriage return and tab are escaped.
 *
 * @pure true
 * @example
 * ```ts
 * quoteLiteral("12"); // "'12'"
 * quoteLiteral("a'b"); // "\"a'b\""
 * ```
 */
export const quoteLiteral = (literal: string): string => {
	const body = literal
		.replaceAll("\\", "\\\\")
		.replaceAll("\n", "\\n")
		.replaceAll("\r", "\\r")
		.replaceAll("\t", "\\t");
	return literal.includes("'") && !literal.includes('"')
		? `"${body}"`
		: `'${body.replaceAll("'", "\\'")}'`;
};

export const radixParseError = (
	literal: string,
	radix: Radix,
): RadixParseError =>
	new RadixParseError({
		literal,
		radix,
		message: `invalid literal for int() with base ${radix}: ${quoteLiteral(literal)}`,
	});

export const base64DecodeError = (input: string): Base64DecodeError =>
	new Base64DecodeError({ input, message: "Invalid base64 input" });

export const base64EncodeError = (value: bigint): Base64EncodeError =>
	new Base64EncodeError({
		value,
		message: "Cannot encode negative number to base64",
	});

export const invalidRequest = (message: string): InvalidRequestError =>
	new InvalidRequestError({ message });

/**
 * Union of every failure a conversion can produce.
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type ConversionError =
	| InvalidTypeError
	| TextConversionError
	| RadixParseError
	| Base64DecodeError
	| Base64EncodeError
	| InvalidRequestError;
