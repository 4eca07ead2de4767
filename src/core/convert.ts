// CHANGE: Conversion dispatcher over static decode/encode tables
// WHY: Labels are validated explicitly before lookup; failures flow as Either and end in the envelope
// PURITY: CORE
// INVARIANT: convert never throws; ∀ r = convert(..): (r.result === null) ⊕ (r.error === null)
// COMPLEXITY: O(|input|) — one decode, one encode

import { Either, pipe } from "effect";

import { base64ToNumber, numberToBase64 } from "./codecs/base64.js";
import { numberToString, stringToNumber } from "./codecs/radix.js";
import { numberToText, textToNumber } from "./codecs/text.js";
import {
	type ConversionError,
	type InvalidTypeError,
	invalidType,
} from "./errors.js";
import {
	type ConversionResult,
	REPRESENTATION_TYPES,
	type RepresentationType,
} from "./models.js";

type Decoder = (input: string) => Either.Either<bigint, ConversionError>;
type Encoder = (value: bigint) => Either.Either<string, ConversionError>;

const DECODERS: Readonly<Record<RepresentationType, Decoder>> = {
	text: textToNumber,
	binary: (input) => stringToNumber(input, 2),
	octal: (input) => stringToNumber(input, 8),
	decimal: (input) => stringToNumber(input, 10),
	hexadecimal: (input) => stringToNumber(input, 16),
	base64: base64ToNumber,
};

const ENCODERS: Readonly<Record<RepresentationType, Encoder>> = {
	text: (value) => Either.right(numberToText(value)),
	binary: (value) => Either.right(numberToString(value, 2)),
	octal: (value) => Either.right(numberToString(value, 8)),
	decimal: (value) => Either.right(numberToString(value, 10)),
	hexadecimal: (value) => Either.right(numberToString(value, 16)),
	base64: numberToBase64,
};

/**
 * Checks whether a label names a representation.
 *
 * @pure true
 * @invariant case-sensitive exact match against REPRESENTATION_TYPES
 */
export const isRepresentationType = (
	label: string,
): label is RepresentationType =>
	REPRESENTATION_TYPES.some((type) => type === label);

const parseType = (
	label: string,
	side: "input" | "output",
): Either.Either<RepresentationType, InvalidTypeError> =>
	isRepresentationType(label)
		? Either.right(label)
		: Either.left(invalidType(side, label));

/**
 * Convert between two representations, keeping the typed failure.
 *
 * @returns Right(encoded) or Left(ConversionError)
 *
 * @pure true
 * @invariant inputType is validated before outputType
 * @complexity O(|input|)
 */
export const convertEither = (
	input: string,
	inputType: string,
	outputType: string,
): Either.Either<string, ConversionError> =>
	pipe(
		Either.all({
			from: parseType(inputType, "input"),
			to: parseType(outputType, "output"),
		}),
		Either.flatMap(({ from, to }) =>
			pipe(DECODERS[from](input), Either.flatMap(ENCODERS[to])),
		),
	);

/**
 * Fold a conversion outcome into the response envelope.
 *
 * @pure true
 */
export const toConversionResult = (
	outcome: Either.Either<string, ConversionError>,
): ConversionResult =>
	Either.match(outcome, {
		onLeft: (error): ConversionResult => ({ result: null, error: error.message }),
		onRight: (result): ConversionResult => ({ result, error: null }),
	});

/**
 * Convert `input` from `inputType` to `outputType`.
 *
 * @returns `{ result, error: null }` on success, `{ result: null, error }` otherwise
 *
 * @pure true
 * @complexity O(|input|)
 *
 * @example
 * ```ts
 * convert("42", "decimal", "binary"); // { result: "101010", error: null }
 * convert("42", "decimal", "nope"); // { result: null, error: "Invalid output type" }
 * ```
 */
export const convert = (
	input: string,
	inputType: string,
	outputType: string,
): ConversionResult =>
	toConversionResult(convertEither(input, inputType, outputType));
