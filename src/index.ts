// CHANGE: Public API entry point for library consumers
// WHY: Export CORE conversion and the HTTP shell; hide CLI internals
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect-returning shell entry points

// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSION (Pure Core)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Convert a value between two representations.
 *
 * @example
 * ```typescript
 * import { convert } from "numconv";
 *
 * convert("42", "decimal", "binary"); // { result: "101010", error: null }
 * convert("eleven", "text", "decimal"); // { result: null, error: "Unable to convert text to number" }
 * ```
 */
export {
	convert,
	convertEither,
	isRepresentationType,
	toConversionResult,
} from "./core/convert.js";
export {
	decodeConversionRequest,
	handleConversionBody,
} from "./core/request.js";

export { base64ToNumber, numberToBase64 } from "./core/codecs/base64.js";
export { numberToString, stringToNumber } from "./core/codecs/radix.js";
export { numberToText, textToNumber } from "./core/codecs/text.js";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type ConversionRequest,
	type ConversionResult,
	type Radix,
	REPRESENTATION_TYPES,
	type RepresentationType,
} from "./core/models.js";
export {
	Base64DecodeError,
	Base64EncodeError,
	type ConversionError,
	InvalidRequestError,
	InvalidTypeError,
	RadixParseError,
	TextConversionError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// HTTP ENDPOINT (Shell)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Start the `POST /convert` endpoint.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { consoleLogger, DEFAULT_SERVER_CONFIG, startServer } from "numconv";
 *
 * const server = await Effect.runPromise(startServer(DEFAULT_SERVER_CONFIG, consoleLogger));
 * console.log(server.url);
 * ```
 */
export { type RunningServer, startServer } from "./shell/http/server.js";
export {
	type HttpRequest,
	type HttpResponse,
	routeRequest,
} from "./shell/http/routes.js";
export { DEFAULT_SERVER_CONFIG, type ServerConfig } from "./core/config.js";
export {
	consoleLogger,
	type Logger,
	silentLogger,
} from "./shell/logging/logger.js";
