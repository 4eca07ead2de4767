// CHANGE: Base64 codec over minimal big-endian byte strings
// WHY: Byte order is a fixed contract; little-endian payloads decode to different values
// SOURCE: https://effect.website/docs/encoding (Encoding.encodeBase64 / decodeBase64)
// FORMAT THEOREM: ∀n ≥ 0: base64ToNumber(numberToBase64(n)) = n
// PURITY: CORE
// INVARIANT: zero encodes as a single 0x00 byte; no other value has a leading zero byte
// COMPLEXITY: O(log₂₅₆ n)

import { Either, Encoding, pipe } from "effect";

import {
	type Base64DecodeError,
	type Base64EncodeError,
	base64DecodeError,
	base64EncodeError,
} from "../errors.js";

/**
 * Minimal big-endian bytes of a non-negative integer.
 *
 * @precondition n ≥ 0
 * @postcondition result.length ≥ 1
 */
export const toBigEndianBytes = (n: bigint): Uint8Array => {
	if (n === 0n) return Uint8Array.of(0);
	const bytes: number[] = [];
	for (let rest = n; rest > 0n; rest >>= 8n) {
		bytes.unshift(Number(rest & 0xffn));
	}
	return Uint8Array.from(bytes);
};

/**
 * Interpret bytes as an unsigned big-endian integer.
 */
export const fromBigEndianBytes = (bytes: Uint8Array): bigint =>
	bytes.reduce((acc, byte) => (acc << 8n) | BigInt(byte), 0n);

/**
 * Encode a non-negative integer as padded standard base64.
 *
 * @returns Right(base64) or Left(Base64EncodeError) for n < 0
 *
 * @pure true
 * @complexity O(log₂₅₆ n)
 *
 * @example
 * ```ts
 * numberToBase64(42n); // Right("Kg==")
 * numberToBase64(0n); // Right("AA==")
 * ```
 */
export const numberToBase64 = (
	n: bigint,
): Either.Either<string, Base64EncodeError> =>
	n < 0n
		? Either.left(base64EncodeError(n))
		: Either.right(Encoding.encodeBase64(toBigEndianBytes(n)));

/**
 * Decode padded standard base64 into an unsigned big-endian integer.
 *
 * @returns Right(n ≥ 0) or Left(Base64DecodeError)
 *
 * @pure true
 * @invariant Left whenever |s| mod 4 ≠ 0, '=' appears before the tail, or a char ∉ [A-Za-z0-9+/]
 * @invariant base64ToNumber("") = Right(0n) (zero bytes read as the empty sum)
 * @complexity O(|s|)
 */
export const base64ToNumber = (
	s: string,
): Either.Either<bigint, Base64DecodeError> =>
	pipe(
		Encoding.decodeBase64(s),
		Either.mapLeft(() => base64DecodeError(s)),
		Either.map(fromBigEndianBytes),
	);
