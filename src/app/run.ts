// CHANGE: APP orchestration for the numconv command line
// WHY: Compose CORE conversion with SHELL output/server; return ExitCode as value
// PURITY: APP (no process.exit)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: ExitCode ∈ {0,1}; every failure is reported through the logger

import { Effect } from "effect";
import { match } from "ts-pattern";

import { type CliCommand, type ServerConfig, USAGE } from "../core/config.js";
import { convert } from "../core/convert.js";
import type { ExitCode } from "../core/models.js";
import { awaitShutdownSignal, startServer } from "../shell/http/server.js";
import type { Logger } from "../shell/logging/logger.js";

/**
 * Convert once and print the result.
 *
 * @pure false (logger output)
 */
const runConvert = (
	input: string,
	from: string,
	to: string,
	logger: Logger,
): Effect.Effect<ExitCode> =>
	Effect.sync((): ExitCode => {
		const outcome = convert(input, from, to);
		if (outcome.error === null) {
			logger.info(outcome.result);
			return 0;
		}
		logger.error(`error: ${outcome.error}`);
		return 1;
	});

/**
 * Serve until SIGINT/SIGTERM, then close the listener.
 *
 * @pure false (binds a socket, waits for signals)
 */
const runServe = (
	config: ServerConfig,
	logger: Logger,
): Effect.Effect<ExitCode> =>
	Effect.gen(function* () {
		const server = yield* startServer(config, logger);
		logger.info(`numconv listening on ${server.url}`);
		const signal = yield* awaitShutdownSignal();
		logger.info(`received ${signal}, shutting down`);
		yield* server.close();
		return 0 as const;
	}).pipe(
		Effect.catchTag("ServerError", (error) =>
			Effect.sync(() => {
				logger.error(`error: ${error.message}`);
				return 1 as const;
			}),
		),
	);

/**
 * Run a parsed command.
 *
 * @returns Effect<ExitCode, never>
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @invariant Invalid → 1, Help → 0
 */
export const runCli = (
	command: CliCommand,
	logger: Logger,
): Effect.Effect<ExitCode> =>
	match<CliCommand, Effect.Effect<ExitCode>>(command)
		.with({ _tag: "Convert" }, ({ input, from, to }) =>
			runConvert(input, from, to, logger),
		)
		.with({ _tag: "Serve" }, ({ config }) => runServe(config, logger))
		.with({ _tag: "Help" }, () =>
			Effect.sync((): ExitCode => {
				logger.info(USAGE);
				return 0;
			}),
		)
		.with({ _tag: "Invalid" }, ({ reason }) =>
			Effect.sync((): ExitCode => {
				logger.error(`error: ${reason}`);
				logger.error(USAGE);
				return 1;
			}),
		)
		.exhaustive();
