// CHANGE: Decode untrusted JSON bodies into ConversionRequest
// WHY: The transport hands over parsed JSON; shape checks stay pure and testable
// PURITY: CORE
// INVARIANT: handleConversionBody always yields an envelope, whatever the body
// COMPLEXITY: O(|input|)

import { Either, pipe } from "effect";

import {
	convertEither,
	isRepresentationType,
	toConversionResult,
} from "./convert.js";
import {
	type ConversionError,
	invalidRequest,
	invalidType,
} from "./errors.js";
import type {
	ConversionRequest,
	ConversionResult,
	JSONValue,
} from "./models.js";

/**
 * Type guard to check if value is a JSON object.
 *
 * @param value Value to check
 * @returns True if value is a non-null object
 */
function isJSONObject(
	value: JSONValue,
): value is { readonly [key: string]: JSONValue } {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Validate a parsed body as a conversion request.
 *
 * Checks run in order: object shape, `input`, `inputType`, `outputType`.
 *
 * @returns Right(request) or Left(InvalidRequestError | InvalidTypeError)
 *
 * @pure true
 * @complexity O(1)
 */
export const decodeConversionRequest = (
	body: JSONValue,
): Either.Either<ConversionRequest, ConversionError> => {
	if (!isJSONObject(body)) {
		return Either.left(invalidRequest("Request body must be a JSON object"));
	}
	const { input, inputType, outputType } = body;
	if (typeof input !== "string") {
		return Either.left(invalidRequest("Missing or invalid 'input' field"));
	}
	if (typeof inputType !== "string" || !isRepresentationType(inputType)) {
		return Either.left(invalidType("input", String(inputType)));
	}
	if (typeof outputType !== "string" || !isRepresentationType(outputType)) {
		return Either.left(invalidType("output", String(outputType)));
	}
	return Either.right({ input, inputType, outputType });
};

/**
 * Decode a body and run the conversion it describes.
 *
 * @pure true
 *
 * @example
 * ```ts
 * handleConversionBody({ input: "ff", inputType: "hexadecimal", outputType: "decimal" });
 * // { result: "255", error: null }
 * handleConversionBody({}); // { result: null, error: "Missing or invalid 'input' field" }
 * ```
 */
export const handleConversionBody = (body: JSONValue): ConversionResult =>
	pipe(
		decodeConversionRequest(body),
		Either.flatMap((request) =>
			convertEither(request.input, request.inputType, request.outputType),
		),
		toConversionResult,
	);
