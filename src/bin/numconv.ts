#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE

import { Effect, pipe } from "effect";

import { runCli } from "../app/run.js";
import { parseCLIArgs } from "../shell/config/cli.js";
import { consoleLogger } from "../shell/logging/logger.js";

Effect.runFork(
	pipe(
		runCli(parseCLIArgs(), consoleLogger),
		// Shell boundary: report fatal and exit with failure
		Effect.catchAllDefect((defect) =>
			Effect.sync(() => {
				console.error("Fatal error:", defect);
				return 1 as const;
			}),
		),
		Effect.flatMap((code) =>
			Effect.sync(() => {
				process.exit(code);
			}),
		),
	),
);
