// CHANGE: Command-line parsing for one-shot conversion and the HTTP server
// WHY: Flag handling uses a lookup table instead of branching per flag
// PURITY: SHELL (reads process.argv / process.env only through defaults)
// INVARIANT: parseCLIArgs is total — every argv yields a CliCommand
// COMPLEXITY: O(|args|)

import { Either, pipe } from "effect";

import {
	type CliCommand,
	DEFAULT_SERVER_CONFIG,
	type ServerConfig,
} from "../../core/config.js";

type ValueFlag = "from" | "to" | "port" | "host" | "maxBodyBytes";

interface ArgState {
	readonly positionals: ReadonlyArray<string>;
	readonly values: Readonly<Partial<Record<ValueFlag, string>>>;
	readonly help: boolean;
	readonly problem: string | null;
}

interface ArgProcessResult {
	readonly state: ArgState;
	readonly skipNext: boolean;
}

const valueFlags: Readonly<Record<string, ValueFlag | undefined>> = {
	"--from": "from",
	"--to": "to",
	"--port": "port",
	"--host": "host",
	"--max-body-bytes": "maxBodyBytes",
};

const helpFlags: ReadonlySet<string> = new Set(["--help", "-h"]);

export type Environment = Readonly<Record<string, string | undefined>>;

// CHANGE: Accept both "--flag value" and "--flag=value"
// WHY: Inputs such as "-42" must still be taken as positionals
function processFlag(
	arg: string,
	next: string | undefined,
	state: ArgState,
): ArgProcessResult {
	const eq = arg.indexOf("=");
	const name = eq === -1 ? arg : arg.slice(0, eq);
	const inline = eq === -1 ? undefined : arg.slice(eq + 1);
	const key = valueFlags[name];

	if (key === undefined) {
		return {
			state: { ...state, problem: `Unknown option: ${name}` },
			skipNext: false,
		};
	}
	const value = inline ?? next;
	if (value === undefined) {
		return {
			state: { ...state, problem: `Missing value for ${name}` },
			skipNext: false,
		};
	}
	return {
		state: { ...state, values: { ...state.values, [key]: value } },
		skipNext: inline === undefined,
	};
}

function processArgument(
	arg: string,
	next: string | undefined,
	state: ArgState,
): ArgProcessResult {
	if (helpFlags.has(arg)) {
		return { state: { ...state, help: true }, skipNext: false };
	}
	if (arg.startsWith("--")) {
		return processFlag(arg, next, state);
	}
	return {
		state: { ...state, positionals: [...state.positionals, arg] },
		skipNext: false,
	};
}

/**
 * Parse a bounded non-negative integer setting.
 *
 * @pure true
 * @invariant Right(n) → min ≤ n ≤ max
 */
export const parseIntegerSetting = (
	raw: string,
	name: string,
	min: number,
	max: number,
): Either.Either<number, string> => {
	const digits: Either.Either<string, string> = /^\d+$/u.test(raw)
		? Either.right(raw)
		: Either.left(raw);
	return pipe(
		digits,
		Either.map(Number),
		Either.filterOrLeft(
			(value) => value >= min && value <= max,
			() => raw,
		),
		Either.mapLeft((value) => `Invalid ${name}: ${value}`),
	);
};

const resolveServerConfig = (
	values: ArgState["values"],
	env: Environment,
): Either.Either<ServerConfig, string> =>
	Either.all({
		port: parseIntegerSetting(
			values.port ?? env["NUMCONV_PORT"] ?? String(DEFAULT_SERVER_CONFIG.port),
			"port",
			0,
			65_535,
		),
		host: Either.right(
			values.host ?? env["NUMCONV_HOST"] ?? DEFAULT_SERVER_CONFIG.host,
		),
		maxBodyBytes: parseIntegerSetting(
			values.maxBodyBytes ?? String(DEFAULT_SERVER_CONFIG.maxBodyBytes),
			"max body bytes",
			1,
			Number.MAX_SAFE_INTEGER,
		),
	});

const invalid = (reason: string): CliCommand => ({ _tag: "Invalid", reason });

function toCommand(state: ArgState, env: Environment): CliCommand {
	if (state.problem !== null) return invalid(state.problem);
	if (state.help) return { _tag: "Help" };

	const [first, second] = state.positionals;
	if (first === undefined) {
		return Object.keys(state.values).length === 0
			? { _tag: "Help" }
			: invalid("Missing input");
	}
	if (second !== undefined) return invalid(`Unexpected argument: ${second}`);

	if (first === "serve") {
		return Either.match(resolveServerConfig(state.values, env), {
			onLeft: invalid,
			onRight: (config): CliCommand => ({ _tag: "Serve", config }),
		});
	}

	const { from, to } = state.values;
	if (from === undefined) return invalid("Missing --from <type>");
	if (to === undefined) return invalid("Missing --to <type>");
	return { _tag: "Convert", input: first, from, to };
}

/**
 * Parse command-line arguments.
 *
 * @param args Arguments after the script name
 * @param env Environment used for server defaults
 *
 * @example
 * ```ts
 * // Command: numconv 42 --from decimal --to binary
 * parseCLIArgs(["42", "--from", "decimal", "--to", "binary"]);
 * // { _tag: "Convert", input: "42", from: "decimal", to: "binary" }
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string> = process.argv.slice(2),
	env: Environment = process.env,
): CliCommand {
	let state: ArgState = {
		positionals: [],
		values: {},
		help: false,
		problem: null,
	};

	for (let i = 0; i < args.length && state.problem === null; i++) {
		const arg: string = args.at(i) ?? "";
		const result = processArgument(arg, args.at(i + 1), state);
		state = result.state;
		if (result.skipNext) {
			i++;
		}
	}

	return toCommand(state, env);
}
