// CHANGE: Tests for the conversion dispatcher
// INVARIANT: ∀ r = convert(..): (r.result === null) ⊕ (r.error === null)

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	convert,
	convertEither,
	isRepresentationType,
} from "../../src/core/convert.js";
import {
	REPRESENTATION_TYPES,
	type RepresentationType,
} from "../../src/core/models.js";
import { expectLeft } from "../utils/builders.js";

describe("convert", () => {
	it.each([
		["42", "decimal", "binary", "101010"],
		["101010", "binary", "decimal", "42"],
		["255", "decimal", "hexadecimal", "ff"],
		["ff", "hexadecimal", "decimal", "255"],
		["64", "decimal", "octal", "100"],
		["100", "octal", "decimal", "64"],
		["five", "text", "decimal", "5"],
		["42", "decimal", "text", "forty-two"],
		["42", "decimal", "base64", "Kg=="],
		["Kg==", "base64", "decimal", "42"],
		["Kg==", "base64", "text", "forty-two"],
	])("converts %j from %s to %s", (input, from, to, result) => {
		expect(convert(input, from, to)).toEqual({ result, error: null });
	});

	it("validates the input type before the output type", () => {
		expect(convert("42", "invalid", "decimal")).toEqual({
			result: null,
			error: "Invalid input type",
		});
		expect(convert("42", "decimal", "invalidType")).toEqual({
			result: null,
			error: "Invalid output type",
		});
		expect(convert("42", "bogus", "alsoBogus")).toEqual({
			result: null,
			error: "Invalid input type",
		});
	});

	it("matches type labels exactly", () => {
		expect(convert("42", "Decimal", "binary").error).toBe("Invalid input type");
		expect(convert("42", "decimal", " binary").error).toBe(
			"Invalid output type",
		);
		expect(convert("42", "toString", "binary").error).toBe(
			"Invalid input type",
		);
	});

	it("surfaces decode failures unmodified", () => {
		expect(convert("123", "binary", "decimal")).toEqual({
			result: null,
			error: "invalid literal for int() with base 2: '123'",
		});
		expect(convert("eleven", "text", "decimal")).toEqual({
			result: null,
			error: "Unable to convert text to number",
		});
		expect(convert("invalid@base64!", "base64", "decimal")).toEqual({
			result: null,
			error: "Invalid base64 input",
		});
	});

	it("decodes an empty base64 payload as zero", () => {
		expect(convert("", "base64", "decimal")).toEqual({
			result: "0",
			error: null,
		});
	});

	it("surfaces encode failures unmodified", () => {
		expect(convert("-5", "decimal", "base64")).toEqual({
			result: null,
			error: "Cannot encode negative number to base64",
		});
	});

	it("renders negatives as sign and magnitude in every radix", () => {
		expect(convert("-42", "decimal", "text").result).toBe("minus forty-two");
		expect(convert("-1", "decimal", "binary").result).toBe("-1");
		expect(convert("-1", "binary", "decimal").result).toBe("-1");
		expect(convert("-255", "decimal", "hexadecimal").result).toBe("-ff");
	});

	it("decodes and re-encodes when both types are the same", () => {
		expect(convert("0xFF", "hexadecimal", "hexadecimal").result).toBe("ff");
		expect(convert("Nil", "text", "text").result).toBe("zero");
	});
});

describe("conversion matrix", () => {
	// The value 2 in every representation.
	const two: Readonly<Record<RepresentationType, string>> = {
		text: "two",
		binary: "10",
		octal: "2",
		decimal: "2",
		hexadecimal: "2",
		base64: "Ag==",
	};

	const pairs = REPRESENTATION_TYPES.flatMap((from) =>
		REPRESENTATION_TYPES.map((to): [RepresentationType, RepresentationType] => [
			from,
			to,
		]),
	);

	it.each(pairs)("converts 2 from %s to %s", (from, to) => {
		expect(convert(two[from], from, to)).toEqual({
			result: two[to],
			error: null,
		});
	});

	it.each(["binary", "octal", "hexadecimal", "base64", "text"] as const)(
		"converts zero to %s and back",
		(type) => {
			const encoded = convert("0", "decimal", type);
			expect(encoded.error).toBeNull();
			expect(convert(encoded.result ?? "", type, "decimal")).toEqual({
				result: "0",
				error: null,
			});
		},
	);
});

describe("convertEither", () => {
	it("keeps the tagged failure", () => {
		const error = expectLeft(convertEither("2", "binary", "decimal"));
		expect(error._tag).toBe("RadixParseError");
	});

	it("reports which side carried the unknown label", () => {
		const error = expectLeft(convertEither("2", "decimal", "roman"));
		expect(error._tag === "InvalidTypeError" && error.side).toBe("output");
	});
});

describe("isRepresentationType", () => {
	it("accepts every representation label", () => {
		for (const type of REPRESENTATION_TYPES) {
			expect(isRepresentationType(type)).toBe(true);
		}
	});

	it("rejects anything else", () => {
		fc.assert(
			fc.property(
				fc.string().filter((s) => !REPRESENTATION_TYPES.some((t) => t === s)),
				(label) => {
					expect(isRepresentationType(label)).toBe(false);
				},
			),
		);
	});
});

describe("envelope invariant", () => {
	it("sets exactly one of result and error for arbitrary input", () => {
		fc.assert(
			fc.property(
				fc.string(),
				fc.constantFrom(...REPRESENTATION_TYPES, "unknown"),
				fc.constantFrom(...REPRESENTATION_TYPES, "unknown"),
				(input, from, to) => {
					const outcome = convert(input, from, to);
					expect(outcome.result === null).not.toBe(outcome.error === null);
				},
			),
		);
	});
});
