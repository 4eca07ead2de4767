// CHANGE: Tests for HTTP routing and status selection
// INVARIANT: malformed bodies → 400; conversion failures → 200 with error envelope

import { describe, expect, it } from "vitest";

import {
	convertRoute,
	errorResponse,
	routeRequest,
} from "../../../src/shell/http/routes.js";

const post = (body: string) =>
	routeRequest({ method: "POST", path: "/convert", body });

describe("routeRequest", () => {
	it("converts on POST /convert", () => {
		expect(
			post(
				JSON.stringify({
					input: "42",
					inputType: "decimal",
					outputType: "binary",
				}),
			),
		).toEqual({ status: 200, body: { result: "101010", error: null } });
	});

	it("answers 200 with the error when the conversion itself fails", () => {
		expect(
			post(
				JSON.stringify({
					input: "123",
					inputType: "binary",
					outputType: "decimal",
				}),
			),
		).toEqual({
			status: 200,
			body: {
				result: null,
				error: "invalid literal for int() with base 2: '123'",
			},
		});
	});

	it("answers 400 for malformed JSON", () => {
		expect(post("{")).toEqual(errorResponse(400, "Invalid JSON body"));
		expect(post("")).toEqual(errorResponse(400, "Invalid JSON body"));
	});

	it("answers 400 for a body of the wrong shape", () => {
		expect(post("{}")).toEqual(
			errorResponse(400, "Missing or invalid 'input' field"),
		);
		expect(
			post(JSON.stringify({ input: "42", inputType: "decimal", outputType: "x" })),
		).toEqual(errorResponse(400, "Invalid output type"));
	});

	it("matches the method case-sensitively", () => {
		expect(
			routeRequest({
				method: "post",
				path: "/convert",
				body: '{"input":"five","inputType":"text","outputType":"decimal"}',
			}),
		).toEqual(errorResponse(405, "Method not allowed"));
	});

	it("reports health on GET /health", () => {
		expect(routeRequest({ method: "GET", path: "/health", body: "" })).toEqual({
			status: 200,
			body: { status: "ok" },
		});
	});

	it("answers 405 for other methods on known paths", () => {
		expect(routeRequest({ method: "GET", path: "/convert", body: "" })).toEqual(
			errorResponse(405, "Method not allowed"),
		);
		expect(routeRequest({ method: "POST", path: "/health", body: "" })).toEqual(
			errorResponse(405, "Method not allowed"),
		);
	});

	it("answers 404 elsewhere", () => {
		expect(routeRequest({ method: "POST", path: "/", body: "{}" })).toEqual(
			errorResponse(404, "Not found"),
		);
	});
});

describe("convertRoute", () => {
	it("rejects a JSON array body", () => {
		expect(convertRoute("[]")).toEqual(
			errorResponse(400, "Request body must be a JSON object"),
		);
	});
});
