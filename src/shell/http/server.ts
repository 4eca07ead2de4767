// CHANGE: node:http transport for the conversion endpoint
// WHY: SHELL owns sockets and JSON serialization; routing stays in routes.ts
// PURITY: SHELL
// EFFECT: Effect<RunningServer, ServerError>
// INVARIANT: one access-log line per response: METHOD path status durationMs

import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Readable } from "node:stream";

import { Effect, pipe } from "effect";

import type { ServerConfig } from "../../core/config.js";
import { ServerError } from "../../core/errors.js";
import type { Logger } from "../logging/logger.js";
import { readBody } from "./body.js";
import { errorResponse, type HttpResponse, routeRequest } from "./routes.js";

export interface RunningServer {
	readonly url: string;
	readonly close: () => Effect.Effect<void, ServerError>;
}

/**
 * The parts of an incoming request the handler reads.
 * `IncomingMessage` satisfies it.
 */
export interface RequestSource extends Readable {
	readonly method?: string | undefined;
	readonly url?: string | undefined;
}

/**
 * The parts of a response the handler writes.
 * `ServerResponse` satisfies it.
 */
export interface ResponseSink {
	writeHead(status: number, headers: Readonly<Record<string, string>>): void;
	end(chunk: string): void;
}

const writeResponse = (res: ResponseSink, response: HttpResponse): void => {
	res.writeHead(response.status, { "Content-Type": "application/json" });
	res.end(JSON.stringify(response.body));
};

/**
 * Path of a request target with any query string removed.
 *
 * @pure true
 * @invariant never throws; the target is taken as received
 *
 * @example
 * ```ts
 * requestPath("/convert?x=1"); // "/convert"
 * requestPath("//"); // "//"
 * ```
 */
export const requestPath = (target: string | undefined): string => {
	const raw = target ?? "/";
	const queryAt = raw.indexOf("?");
	return queryAt === -1 ? raw : raw.slice(0, queryAt);
};

/**
 * Build the per-request program: read body → route → write → log.
 *
 * @pure false (socket I/O)
 * @effect Effect<HttpResponse, never>
 */
export const handleRequest = (
	req: RequestSource,
	res: ResponseSink,
	config: ServerConfig,
	logger: Logger,
): Effect.Effect<HttpResponse> => {
	const startedAt = Date.now();
	const method = req.method ?? "GET";
	const path = requestPath(req.url);

	return pipe(
		readBody(req, config.maxBodyBytes),
		Effect.map((body) => routeRequest({ method, path, body })),
		Effect.catchTags({
			BodyTooLargeError: (error) =>
				Effect.succeed(errorResponse(413, error.message)),
			RequestStreamError: (error) =>
				Effect.succeed(errorResponse(400, error.message)),
		}),
		Effect.tap((response) =>
			Effect.sync(() => {
				writeResponse(res, response);
				logger.info(
					`${method} ${path} ${response.status} ${Date.now() - startedAt}ms`,
				);
			}),
		),
	);
};

const closeServer = (server: Server): Effect.Effect<void, ServerError> =>
	Effect.async<void, ServerError>((resume) => {
		server.close((error) => {
			resume(
				error === undefined
					? Effect.void
					: Effect.fail(new ServerError({ message: error.message })),
			);
		});
	});

const urlOf = (server: Server, config: ServerConfig): string => {
	const address: AddressInfo | string | null = server.address();
	const port =
		typeof address === "object" && address !== null
			? address.port
			: config.port;
	return `http://${config.host}:${port}`;
};

/**
 * Start listening for conversion requests.
 *
 * @pure false (binds a socket)
 * @effect Effect<RunningServer, ServerError>
 */
export const startServer = (
	config: ServerConfig,
	logger: Logger,
): Effect.Effect<RunningServer, ServerError> =>
	Effect.async<RunningServer, ServerError>((resume) => {
		const server = createServer((req, res) => {
			Effect.runFork(handleRequest(req, res, config, logger));
		});

		const onError = (error: Error): void => {
			resume(Effect.fail(new ServerError({ message: error.message })));
		};
		server.once("error", onError);
		server.listen(config.port, config.host, () => {
			server.off("error", onError);
			resume(
				Effect.succeed({
					url: urlOf(server, config),
					close: () => closeServer(server),
				}),
			);
		});
	});

/**
 * Where shutdown signals come from. `process` satisfies it.
 */
export interface SignalSource {
	once(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): void;
	off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): void;
}

/**
 * Suspend until SIGINT or SIGTERM arrives.
 *
 * @pure false (signal listeners)
 * @invariant listeners are detached on the first signal and on interruption
 */
export const awaitShutdownSignal = (
	source: SignalSource = process,
): Effect.Effect<NodeJS.Signals> =>
	Effect.async<NodeJS.Signals>((resume) => {
		const signals: ReadonlyArray<NodeJS.Signals> = ["SIGINT", "SIGTERM"];
		const detach = (): void => {
			for (const signal of signals) source.off(signal, onSignal);
		};
		function onSignal(signal: NodeJS.Signals): void {
			detach();
			resume(Effect.succeed(signal));
		}
		for (const signal of signals) source.once(signal, onSignal);
		return Effect.sync(detach);
	});
