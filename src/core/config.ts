// CHANGE: Configuration and command types shared by SHELL and APP
// WHY: CLI parsing produces plain data; APP interprets it
// PURITY: CORE
// INVARIANT: 0 ≤ port ≤ 65535 ∧ maxBodyBytes > 0

/**
 * HTTP endpoint settings.
 *
 * @property port TCP port; 0 lets the OS pick one
 * @property host Interface to bind
 * @property maxBodyBytes Upper bound on request body size
 */
export interface ServerConfig {
	readonly port: number;
	readonly host: string;
	readonly maxBodyBytes: number;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
	port: 3000,
	host: "127.0.0.1",
	maxBodyBytes: 64 * 1024,
};

/**
 * What the command line asked for.
 */
export type CliCommand =
	| {
			readonly _tag: "Convert";
			readonly input: string;
			readonly from: string;
			readonly to: string;
	  }
	| { readonly _tag: "Serve"; readonly config: ServerConfig }
	| { readonly _tag: "Help" }
	| { readonly _tag: "Invalid"; readonly reason: string };

export const USAGE = [
	"Usage:",
	"  numconv <input> --from <type> --to <type>",
	"  numconv serve [--port <n>] [--host <host>] [--max-body-bytes <n>]",
	"  numconv --help",
	"",
	"Types: text, binary, octal, decimal, hexadecimal, base64",
	"Environment: NUMCONV_PORT, NUMCONV_HOST",
].join("\n");
