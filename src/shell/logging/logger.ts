// CHANGE: Minimal logging seam for SHELL and APP
// WHY: CORE never logs; SHELL writes through one interface so tests can capture output
// PURITY: SHELL
// INVARIANT: info → stdout, error → stderr

/**
 * Line-oriented output sink.
 */
export interface Logger {
	readonly info: (message: string) => void;
	readonly error: (message: string) => void;
}

export const consoleLogger: Logger = {
	info: (message) => {
		console.log(message);
	},
	error: (message) => {
		console.error(message);
	},
};

export const silentLogger: Logger = {
	info: () => undefined,
	error: () => undefined,
};
