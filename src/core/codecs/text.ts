// CHANGE: English number-word codec
// WHY: Decoding accepts only the words zero..ten (plus "nil"); encoding renders any integer
// PURITY: CORE
// INVARIANT: vocabularies are deliberately asymmetric — textToNumber ⊂ [0, 10], numberToText: ℤ → String
// COMPLEXITY: O(|text|) decode, O(log₁₀₀₀ |n|) encode

import { Array as Arr, Either } from "effect";

import { type TextConversionError, textConversionError } from "../errors.js";

const NUMBER_WORDS: ReadonlyMap<string, bigint> = new Map([
	["zero", 0n],
	["nil", 0n],
	["one", 1n],
	["two", 2n],
	["three", 3n],
	["four", 4n],
	["five", 5n],
	["six", 6n],
	["seven", 7n],
	["eight", 8n],
	["nine", 9n],
	["ten", 10n],
]);

const UNITS: ReadonlyArray<string> = [
	"zero",
	"one",
	"two",
	"three",
	"four",
	"five",
	"six",
	"seven",
	"eight",
	"nine",
	"ten",
	"eleven",
	"twelve",
	"thirteen",
	"fourteen",
	"fifteen",
	"sixteen",
	"seventeen",
	"eighteen",
	"nineteen",
];

const TENS: ReadonlyArray<string> = [
	"",
	"",
	"twenty",
	"thirty",
	"forty",
	"fifty",
	"sixty",
	"seventy",
	"eighty",
	"ninety",
];

// Index i names the group 1000^(i + 1).
const SCALES: ReadonlyArray<string> = [
	"thousand",
	"million",
	"billion",
	"trillion",
	"quadrillion",
	"quintillion",
	"sextillion",
	"septillion",
	"octillion",
	"nonillion",
	"decillion",
];

/**
 * Decode a single English number word.
 *
 * @param text - Raw token; case and non-letter characters are ignored
 * @returns Right(0..10) or Left(TextConversionError)
 *
 * @pure true
 * @invariant ∀ w ∈ dom(NUMBER_WORDS): textToNumber(w) = Right(NUMBER_WORDS(w))
 * @complexity O(|text|)
 *
 * @example
 * ```ts
 * textToNumber("Five!"); // Right(5n)
 * textToNumber("eleven"); // Left(TextConversionError)
 * ```
 */
export const textToNumber = (
	text: string,
): Either.Either<bigint, TextConversionError> =>
	Either.fromNullable(
		NUMBER_WORDS.get(text.toLowerCase().replace(/\P{L}/gu, "")),
		() => textConversionError(text),
	);

// INVARIANT: callers index UNITS below 20 and TENS below 10
const wordAt = (table: ReadonlyArray<string>, index: bigint): string =>
	Arr.unsafeGet(table, Number(index));

/**
 * Words for 0 < n < 100.
 *
 * @complexity O(1)
 */
const belowHundred = (n: bigint): string => {
	if (n < 20n) return wordAt(UNITS, n);
	const unit = n % 10n;
	const tens = wordAt(TENS, n / 10n);
	return unit === 0n ? tens : `${tens}-${wordAt(UNITS, unit)}`;
};

/**
 * Words for 0 < n < 1000.
 *
 * @complexity O(1)
 */
const belowThousand = (n: bigint): string => {
	const hundreds = n / 100n;
	const rest = n % 100n;
	if (hundreds === 0n) return belowHundred(rest);
	const head = `${wordAt(UNITS, hundreds)} hundred`;
	return rest === 0n ? head : `${head} and ${belowHundred(rest)}`;
};

/**
 * Split an integer into base-1000 groups, least significant first,
 * keeping at most SCALES.length groups; the top group absorbs any overflow.
 */
const thousandGroups = (n: bigint): ReadonlyArray<bigint> => {
	const groups: bigint[] = [];
	let rest = n;
	while (rest > 0n && groups.length < SCALES.length - 1) {
		groups.push(rest % 1000n);
		rest /= 1000n;
	}
	if (rest > 0n) groups.push(rest);
	return groups;
};

/**
 * Words for n > 0.
 *
 * CHANGE: Groups above "decillion" recurse into the top group
 * WHY: Encoding must stay total for arbitrarily large magnitudes
 *
 * @complexity O(log₁₀₀₀ n)
 */
const positiveToText = (n: bigint): string => {
	const lowest = n % 1000n;
	const higherParts = Arr.zip(thousandGroups(n / 1000n), SCALES)
		.filter(([group]) => group > 0n)
		.map(([group, scale]) => {
			const words =
				group >= 1000n ? positiveToText(group) : belowThousand(group);
			return `${words} ${scale}`;
		})
		.reverse();
	if (lowest === 0n) return higherParts.join(", ");
	const lowestPart = belowThousand(lowest);
	if (higherParts.length === 0) return lowestPart;
	const joiner = lowest < 100n ? " and " : ", ";
	return `${higherParts.join(", ")}${joiner}${lowestPart}`;
};

/**
 * Render an integer as English words.
 *
 * @param n - Any integer, negative included
 * @returns "zero" for 0, "minus " + words(|n|) for negatives
 *
 * @pure true
 * @invariant n < 0 → result.startsWith("minus ")
 * @complexity O(log₁₀₀₀ |n|)
 *
 * @example
 * ```ts
 * numberToText(42n); // "forty-two"
 * numberToText(123n); // "one hundred and twenty-three"
 * numberToText(-1n); // "minus one"
 * ```
 */
export const numberToText = (n: bigint): string => {
	if (n === 0n) return "zero";
	if (n < 0n) return `minus ${positiveToText(-n)}`;
	return positiveToText(n);
};
