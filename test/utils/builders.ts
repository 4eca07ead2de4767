// CHANGE: Shared test helpers for Either assertions and captured output
// WHY: Builders are pure and reusable across CORE, SHELL and APP tests

import { Either } from "effect";

import type { Logger } from "../../src/shell/logging/logger.js";

/** Unwrap a Right or fail the test with the Left value. */
export const expectRight = <A, E>(either: Either.Either<A, E>): A => {
	if (Either.isLeft(either)) {
		throw new Error(`expected Right, got Left: ${String(either.left)}`);
	}
	return either.right;
};

/** Unwrap a Left or fail the test with the Right value. */
export const expectLeft = <A, E>(either: Either.Either<A, E>): E => {
	if (Either.isRight(either)) {
		throw new Error(`expected Left, got Right: ${String(either.right)}`);
	}
	return either.left;
};

export interface RecordingLogger extends Logger {
	readonly infos: ReadonlyArray<string>;
	readonly errors: ReadonlyArray<string>;
}

/** Build a logger that keeps every line it receives. */
export const recordingLogger = (): RecordingLogger => {
	const infos: string[] = [];
	const errors: string[] = [];
	return {
		infos,
		errors,
		info: (message) => {
			infos.push(message);
		},
		error: (message) => {
			errors.push(message);
		},
	};
};
