// src/transport.ts

import { EventEmitter } from "node:events";
import * as net from "node:net";
import { SerialPort } from "serialport";
import type { SerialOptions } from "./types";

export const DEFAULT_IP_PORT = 84;
export const DEFAULT_BAUD_RATE = 115200;

/**
 * Events every transport emits.
 */
export interface TransportEvents {
	/** Raw bytes received from the device */
	data: (chunk: Buffer) => void;
	/** The byte stream ended, either on request or because of an I/O error */
	close: (hadError: boolean) => void;
	/** An I/O error; a `close` event follows when the stream is lost */
	error: (error: Error) => void;
}

/**
 * A byte stream with connect/read/write/disconnect. Reading is push based:
 * bytes arrive through the `data` event for as long as the stream is open.
 */
export interface Transport {
	readonly isOpen: boolean;
	open(): Promise<void>;
	write(data: string): Promise<void>;
	/** Discards bytes buffered below this layer (no-op where there are none) */
	clearBuffers(): Promise<void>;
	close(): Promise<void>;
	/** Human readable endpoint, for logs */
	describe(): string;
	on<K extends keyof TransportEvents>(
		event: K,
		listener: TransportEvents[K],
	): this;
	off<K extends keyof TransportEvents>(
		event: K,
		listener: TransportEvents[K],
	): this;
}

/**
 * EventEmitter with the transport event map applied.
 */
export abstract class BaseTransport extends EventEmitter implements Transport {
	abstract get isOpen(): boolean;
	abstract open(): Promise<void>;
	abstract write(data: string): Promise<void>;
	abstract clearBuffers(): Promise<void>;
	abstract close(): Promise<void>;
	abstract describe(): string;

	on<K extends keyof TransportEvents>(
		event: K,
		listener: TransportEvents[K],
	): this {
		return super.on(event, listener);
	}
	off<K extends keyof TransportEvents>(
		event: K,
		listener: TransportEvents[K],
	): this {
		return super.off(event, listener);
	}
	emit<K extends keyof TransportEvents>(
		event: K,
		...args: Parameters<TransportEvents[K]>
	): boolean {
		return super.emit(event, ...args);
	}
}

/**
 * TCP transport, for processors reached over the network (port 84 by default)
 * or through a serial-to-IP bridge.
 */
export class TcpTransport extends BaseTransport {
	private socket: net.Socket | null = null;

	constructor(
		private readonly host: string,
		private readonly port: number,
		private readonly connectTimeoutMs = 2000,
	) {
		super();
	}

	get isOpen(): boolean {
		return this.socket !== null;
	}

	describe(): string {
		return `${this.host}:${this.port}`;
	}

	async open(): Promise<void> {
		if (this.socket) return;

		const socket = new net.Socket();

		await new Promise<void>((resolve, reject) => {
			const onError = (err: Error) => {
				clearTimeout(timer);
				socket.destroy();
				reject(err);
			};
			const timer = setTimeout(() => {
				socket.off("error", onError);
				socket.destroy();
				reject(
					new Error(
						`Connection to ${this.describe()} timed out after ${this.connectTimeoutMs}ms`,
					),
				);
			}, this.connectTimeoutMs);

			socket.once("error", onError);
			socket.connect(this.port, this.host, () => {
				clearTimeout(timer);
				socket.off("error", onError);
				resolve();
			});
		});

		socket.setNoDelay(true);
		socket.on("data", (chunk: Buffer) => this.emit("data", chunk));
		socket.on("error", (err) => this.emit("error", err));
		socket.on("close", (hadError) => {
			if (this.socket === socket) {
				this.socket = null;
			}
			this.emit("close", hadError);
		});
		this.socket = socket;
	}

	write(data: string): Promise<void> {
		const socket = this.socket;
		if (!socket) {
			return Promise.reject(new Error("Socket is not open"));
		}
		return new Promise((resolve, reject) => {
			socket.write(data, "latin1", (err) => (err ? reject(err) : resolve()));
		});
	}

	async clearBuffers(): Promise<void> {
		// Sockets keep no input buffer below the data event
	}

	close(): Promise<void> {
		const socket = this.socket;
		if (!socket) return Promise.resolve();
		return new Promise((resolve) => {
			socket.once("close", () => resolve());
			socket.destroy();
		});
	}
}

/**
 * RS-232 transport built on the serialport package.
 */
export class SerialTransport extends BaseTransport {
	private port: SerialPort | null = null;
	private readonly options: Required<SerialOptions>;

	constructor(
		private readonly path: string,
		options: SerialOptions = {},
	) {
		super();
		this.options = {
			baudRate: DEFAULT_BAUD_RATE,
			dataBits: 8,
			parity: "none",
			stopBits: 1,
			...options,
		};
	}

	get isOpen(): boolean {
		return this.port?.isOpen ?? false;
	}

	describe(): string {
		const { baudRate, dataBits, parity, stopBits } = this.options;
		return `${this.path} (${baudRate} ${dataBits}${parity[0].toUpperCase()}${stopBits})`;
	}

	async open(): Promise<void> {
		if (this.port?.isOpen) return;

		const port = new SerialPort({
			path: this.path,
			...this.options,
			autoOpen: false,
		});

		await new Promise<void>((resolve, reject) => {
			port.open((err) => (err ? reject(err) : resolve()));
		});

		port.on("data", (chunk: Buffer) => this.emit("data", chunk));
		port.on("error", (err: Error) => this.emit("error", err));
		port.on("close", (err?: Error | null) => {
			if (this.port === port) {
				this.port = null;
			}
			this.emit("close", Boolean(err));
		});
		this.port = port;
	}

	write(data: string): Promise<void> {
		const port = this.port;
		if (!port) {
			return Promise.reject(new Error("Serial port is not open"));
		}
		return new Promise((resolve, reject) => {
			port.write(data, "latin1", (err) => {
				if (err) {
					reject(err);
					return;
				}
				port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
			});
		});
	}

	/**
	 * Discards received-but-unread and written-but-unsent bytes in the driver.
	 */
	clearBuffers(): Promise<void> {
		const port = this.port;
		if (!port) return Promise.resolve();
		return new Promise((resolve, reject) => {
			port.flush((err) => (err ? reject(err) : resolve()));
		});
	}

	close(): Promise<void> {
		const port = this.port;
		if (!port || !port.isOpen) {
			this.port = null;
			return Promise.resolve();
		}
		return new Promise((resolve, reject) => {
			port.close((err) => (err ? reject(err) : resolve()));
		});
	}
}

export type Endpoint =
	| { type: "tcp"; host: string; port: number }
	| { type: "serial"; path: string };

/**
 * Parses an endpoint string. `socket://host:port` and `tcp://host:port` are
 * network endpoints; anything else is taken as a serial device path.
 */
export function parseEndpoint(endpoint: string): Endpoint {
	const trimmed = endpoint.trim();
	if (!/^(socket|tcp):\/\//i.test(trimmed)) {
		if (trimmed.length === 0) {
			throw new RangeError("Endpoint must not be empty");
		}
		return { type: "serial", path: trimmed };
	}

	const url = new URL(trimmed);
	const host = url.hostname.replace(/^\[|\]$/g, "");
	if (!host) {
		throw new RangeError(`Endpoint ${endpoint} has no host`);
	}
	const port = url.port ? Number.parseInt(url.port, 10) : DEFAULT_IP_PORT;
	return { type: "tcp", host, port };
}

/**
 * Default transport factory.
 */
export function createTransport(
	endpoint: string,
	serial: SerialOptions = {},
	connectTimeoutMs = 2000,
): Transport {
	const parsed = parseEndpoint(endpoint);
	if (parsed.type === "tcp") {
		return new TcpTransport(parsed.host, parsed.port, connectTimeoutMs);
	}
	return new SerialTransport(parsed.path, serial);
}
