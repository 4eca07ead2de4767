// CHANGE: Route table for the conversion endpoint
// WHY: Routing and status selection are pure; the server only moves bytes
// PURITY: SHELL (no I/O, but owns HTTP status semantics)
// INVARIANT: every response body is JSON; conversion failures keep status 200
// COMPLEXITY: O(|body|)

import { Either, pipe } from "effect";
import { match } from "ts-pattern";

import { convertEither, toConversionResult } from "../../core/convert.js";
import { invalidRequest } from "../../core/errors.js";
import type { ConversionResult, JSONValue } from "../../core/models.js";
import { decodeConversionRequest } from "../../core/request.js";

export interface HttpRequest {
	readonly method: string;
	readonly path: string;
	readonly body: string;
}

export interface HealthStatus {
	readonly status: "ok";
}

export interface HttpResponse {
	readonly status: number;
	readonly body: ConversionResult | HealthStatus;
}

interface RouteKey {
	readonly method: string;
	readonly path: string;
}

export const errorResponse = (status: number, error: string): HttpResponse => ({
	status,
	body: { result: null, error },
});

const parseJSON = (raw: string): Either.Either<JSONValue, string> =>
	Either.try({
		try: (): JSONValue => JSON.parse(raw),
		catch: () => "Invalid JSON body",
	});

/**
 * Handle `POST /convert`.
 *
 * Malformed JSON or a body of the wrong shape answers 400; a well-formed
 * request always answers 200 with the conversion envelope.
 */
export const convertRoute = (raw: string): HttpResponse =>
	pipe(
		parseJSON(raw),
		Either.mapLeft(invalidRequest),
		Either.flatMap(decodeConversionRequest),
		Either.match({
			onLeft: (error) => errorResponse(400, error.message),
			onRight: (request) => ({
				status: 200,
				body: toConversionResult(
					convertEither(request.input, request.inputType, request.outputType),
				),
			}),
		}),
	);

/**
 * Dispatch a request to its handler.
 *
 * @example
 * ```ts
 * routeRequest({ method: "GET", path: "/health", body: "" });
 * // { status: 200, body: { status: "ok" } }
 * ```
 */
export const routeRequest = (request: HttpRequest): HttpResponse =>
	match<RouteKey, HttpResponse>({
		method: request.method,
		path: request.path,
	})
		.with({ method: "POST", path: "/convert" }, () =>
			convertRoute(request.body),
		)
		.with({ method: "GET", path: "/health" }, () => ({
			status: 200,
			body: { status: "ok" },
		}))
		.with({ path: "/convert" }, { path: "/health" }, () =>
			errorResponse(405, "Method not allowed"),
		)
		.otherwise(() => errorResponse(404, "Not found"));
