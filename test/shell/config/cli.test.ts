// CHANGE: Tests for command-line parsing
// INVARIANT: parseCLIArgs is total and never reads process state when args/env are given

import { describe, expect, it } from "vitest";

import {
	parseCLIArgs,
	parseIntegerSetting,
} from "../../../src/shell/config/cli.js";
import { expectLeft, expectRight } from "../../utils/builders.js";

describe("parseCLIArgs", () => {
	it("parses a one-shot conversion", () => {
		expect(
			parseCLIArgs(["42", "--from", "decimal", "--to", "binary"], {}),
		).toEqual({ _tag: "Convert", input: "42", from: "decimal", to: "binary" });
	});

	it("accepts --flag=value and flags before the input", () => {
		expect(
			parseCLIArgs(["--to=hexadecimal", "--from=decimal", "255"], {}),
		).toEqual({
			_tag: "Convert",
			input: "255",
			from: "decimal",
			to: "hexadecimal",
		});
	});

	it("takes a negative number as the input", () => {
		expect(parseCLIArgs(["-42", "--from", "decimal", "--to", "text"], {})).toEqual(
			{ _tag: "Convert", input: "-42", from: "decimal", to: "text" },
		);
	});

	it("shows help for no arguments, --help or -h", () => {
		expect(parseCLIArgs([], {})).toEqual({ _tag: "Help" });
		expect(parseCLIArgs(["--help"], {})).toEqual({ _tag: "Help" });
		expect(parseCLIArgs(["42", "-h"], {})).toEqual({ _tag: "Help" });
	});

	it("uses server defaults", () => {
		expect(parseCLIArgs(["serve"], {})).toEqual({
			_tag: "Serve",
			config: { port: 3000, host: "127.0.0.1", maxBodyBytes: 65_536 },
		});
	});

	it("reads server settings from flags before the environment", () => {
		const env = { NUMCONV_PORT: "4000", NUMCONV_HOST: "0.0.0.0" };
		expect(parseCLIArgs(["serve"], env)).toEqual({
			_tag: "Serve",
			config: { port: 4000, host: "0.0.0.0", maxBodyBytes: 65_536 },
		});
		expect(
			parseCLIArgs(
				["serve", "--port", "8080", "--host", "localhost", "--max-body-bytes", "512"],
				env,
			),
		).toEqual({
			_tag: "Serve",
			config: { port: 8080, host: "localhost", maxBodyBytes: 512 },
		});
	});

	it.each<[ReadonlyArray<string>, string]>([
		[["serve", "--port", "70000"], "Invalid port: 70000"],
		[["serve", "--port", "abc"], "Invalid port: abc"],
		[["serve", "--max-body-bytes", "0"], "Invalid max body bytes: 0"],
		[["42"], "Missing --from <type>"],
		[["42", "--from", "decimal"], "Missing --to <type>"],
		[["--from", "decimal", "--to", "binary"], "Missing input"],
		[["42", "43", "--from", "decimal", "--to", "binary"], "Unexpected argument: 43"],
		[["--bogus"], "Unknown option: --bogus"],
		[["42", "--from"], "Missing value for --from"],
	])("rejects %j", (args, reason) => {
		expect(parseCLIArgs(args, {})).toEqual({ _tag: "Invalid", reason });
	});

	it("rejects an out-of-range port from the environment", () => {
		expect(parseCLIArgs(["serve"], { NUMCONV_PORT: "-1" })).toEqual({
			_tag: "Invalid",
			reason: "Invalid port: -1",
		});
	});
});

describe("parseIntegerSetting", () => {
	it("accepts values inside the bounds", () => {
		expect(expectRight(parseIntegerSetting("0", "port", 0, 10))).toBe(0);
		expect(expectRight(parseIntegerSetting("10", "port", 0, 10))).toBe(10);
	});

	it("rejects values outside the bounds or with non-digits", () => {
		expect(expectLeft(parseIntegerSetting("11", "port", 0, 10))).toBe(
			"Invalid port: 11",
		);
		expect(expectLeft(parseIntegerSetting("1.5", "port", 0, 10))).toBe(
			"Invalid port: 1.5",
		);
		expect(expectLeft(parseIntegerSetting("", "port", 0, 10))).toBe(
			"Invalid port: ",
		);
	});
});
