// src/errors.ts

/**
 * Error codes raised by the protocol engine and the device facade.
 */
export type ProcessorErrorCode =
	| "CONNECTION_ERROR"
	| "TIMEOUT"
	| "PROTOCOL_ERROR"
	| "UNSUPPORTED";

/**
 * Base class for every error this library raises on purpose.
 */
export class ProcessorError extends Error {
	public readonly code: ProcessorErrorCode;
	public readonly details?: Record<string, unknown>;

	constructor(
		message: string,
		code: ProcessorErrorCode,
		details?: Record<string, unknown>,
	) {
		super(message);
		this.name = "ProcessorError";
		this.code = code;
		this.details = details;
	}
}

/**
 * The transport is unavailable, was lost, or the engine was closed.
 * Never retried by the engine itself.
 */
export class ConnectionError extends ProcessorError {
	constructor(message: string, details?: Record<string, unknown>) {
		super(message, "CONNECTION_ERROR", details);
		this.name = "ConnectionError";
	}
}

/**
 * No qualifying reply arrived before the deadline.
 */
export class TimeoutError extends ProcessorError {
	/** The command that went unanswered */
	public readonly command: string;
	public readonly timeoutMs: number;
	/** Everything received between the write and the deadline, echo lines included */
	public readonly partial: string;

	constructor(command: string, timeoutMs: number, partial: string) {
		super(
			`Timeout waiting for response to ${command} after ${timeoutMs}ms (received: ${JSON.stringify(partial)})`,
			"TIMEOUT",
			{ command, timeoutMs, partial },
		);
		this.name = "TimeoutError";
		this.command = command;
		this.timeoutMs = timeoutMs;
		this.partial = partial;
	}
}

/**
 * A received line that cannot be classified at all. Logged and dropped,
 * never fatal to the read loop.
 */
export class ProtocolError extends ProcessorError {
	public readonly line: string;

	constructor(message: string, line: string) {
		super(message, "PROTOCOL_ERROR", { line });
		this.name = "ProtocolError";
		this.line = line;
	}
}

/**
 * The selected model does not implement the requested feature.
 */
export class UnsupportedFeatureError extends ProcessorError {
	constructor(feature: string, model: string) {
		super(`${feature} is not supported by ${model}`, "UNSUPPORTED", {
			feature,
			model,
		});
		this.name = "UnsupportedFeatureError";
	}
}
