// CHANGE: Read a request body as an Effect with a size cap
// WHY: Stream callbacks become a typed failure channel instead of thrown errors
// PURITY: SHELL
// EFFECT: Effect<string, BodyTooLargeError | RequestStreamError>
// INVARIANT: resumes exactly once; listeners are detached afterwards

import type { Readable } from "node:stream";

import { Effect } from "effect";

import {
	BodyTooLargeError,
	RequestStreamError,
} from "../../core/errors.js";

/**
 * Collect a readable stream into a UTF-8 string.
 *
 * @param stream - Request (or any readable) to drain
 * @param maxBytes - Fails with BodyTooLargeError once more bytes than this arrive
 *
 * @pure false (consumes the stream)
 * @complexity O(n) where n = body length
 */
export const readBody = (
	stream: Readable,
	maxBytes: number,
): Effect.Effect<string, BodyTooLargeError | RequestStreamError> =>
	Effect.async<string, BodyTooLargeError | RequestStreamError>((resume) => {
		const chunks: Buffer[] = [];
		let size = 0;

		const detach = (): void => {
			stream.off("data", onData);
			stream.off("end", onEnd);
			stream.off("error", onError);
		};

		function onData(chunk: Buffer | string): void {
			const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
			size += buffer.length;
			if (size > maxBytes) {
				detach();
				// drain the remainder unread
				stream.resume();
				resume(
					Effect.fail(
						new BodyTooLargeError({
							limit: maxBytes,
							message: "Request body too large",
						}),
					),
				);
				return;
			}
			chunks.push(buffer);
		}

		function onEnd(): void {
			detach();
			resume(Effect.succeed(Buffer.concat(chunks).toString("utf8")));
		}

		function onError(error: Error): void {
			detach();
			resume(Effect.fail(new RequestStreamError({ message: error.message })));
		}

		stream.on("data", onData);
		stream.on("end", onEnd);
		stream.on("error", onError);

		return Effect.sync(detach);
	});
