// src/logger.ts

/**
 * Minimal logging sink. Anything with these four methods (console, pino,
 * winston) can be passed in through the engine options.
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/**
 * Console logger that prefixes every line with an ISO timestamp and a scope.
 * Debug output is dropped unless `debug` is enabled.
 */
export class ConsoleLogger implements Logger {
	constructor(
		private readonly scope: string,
		private readonly debugEnabled = false,
	) {}

	private prefix(): string {
		return `[${new Date().toISOString()}] [${this.scope}]`;
	}

	debug(message: string, ...args: unknown[]): void {
		if (this.debugEnabled) {
			console.debug(`${this.prefix()} ${message}`, ...args);
		}
	}

	info(message: string, ...args: unknown[]): void {
		console.info(`${this.prefix()} ${message}`, ...args);
	}

	warn(message: string, ...args: unknown[]): void {
		console.warn(`${this.prefix()} ${message}`, ...args);
	}

	error(message: string, ...args: unknown[]): void {
		console.error(`${this.prefix()} ${message}`, ...args);
	}
}

export function createLogger(scope: string, debug = false): Logger {
	return new ConsoleLogger(scope, debug);
}
