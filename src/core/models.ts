// CHANGE: Domain models for number representation conversion
// WHY: CORE owns the immutable request/result shapes; SHELL only serializes them
// PURITY: CORE
// INVARIANT: ConversionResult carries exactly one non-null field
// COMPLEXITY: O(1)

/**
 * Every textual representation a number can be converted from or to.
 *
 * @invariant labels are case-sensitive and matched exactly
 */
export const REPRESENTATION_TYPES = [
	"text",
	"binary",
	"octal",
	"decimal",
	"hexadecimal",
	"base64",
] as const;

export type RepresentationType = (typeof REPRESENTATION_TYPES)[number];

/**
 * Positional radices understood by the base-string codec.
 */
export type Radix = 2 | 8 | 10 | 16;

/**
 * A validated conversion request.
 *
 * @remarks
 * - @pure true
 * - @invariant inputType, outputType ∈ REPRESENTATION_TYPES
 */
export interface ConversionRequest {
	readonly input: string;
	readonly inputType: RepresentationType;
	readonly outputType: RepresentationType;
}

/**
 * Response envelope returned for every conversion attempt.
 *
 * @remarks
 * - @invariant (result === null) ⊕ (error === null)
 */
export type ConversionResult =
	| { readonly result: string; readonly error: null }
	| { readonly result: null; readonly error: string };

/**
 * Exit code for the command-line entry point.
 *
 * @remarks
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };
