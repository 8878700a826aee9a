// src/engine.ts

import { EventEmitter } from "node:events";
import { CallbackDispatcher } from "./dispatcher";
import { ConnectionError, TimeoutError } from "./errors";
import { createLogger, type Logger } from "./logger";
import {
	COMMAND_EOL,
	classifyLine,
	ECHO_MARKER,
	RESPONSE_EOL,
	splitLines,
	validateLine,
} from "./protocol";
import { Throttle } from "./throttle";
import { createTransport, type Transport } from "./transport";
import {
	ConnectionState,
	type Connectivity,
	type ProtocolEngineEvents,
	type ProtocolEngineOptions,
	type ProtocolEngineSettings,
	type SerialOptions,
	type StateUpdateHandler,
	type StateUpdateKind,
	type Subscription,
	type TransportFactory,
} from "./types";

const DEFAULT_SETTINGS: Required<ProtocolEngineSettings> = {
	minCommandIntervalMs: 50,
	commandTimeoutMs: 2000,
	connectTimeoutMs: 2000,
};

/**
 * The in-flight command's reply slot. At most one exists at a time.
 */
interface PendingRequest {
	command: string;
	/** Everything received since the slot was opened, for timeout diagnostics */
	received: string;
	resolve: (line: string) => void;
	reject: (reason: Error) => void;
	timer: NodeJS.Timeout;
}

interface QueuedSender {
	grant: () => void;
	reject: (reason: Error) => void;
	/** Gives up the place in the queue once the caller's deadline passes */
	timer: NodeJS.Timeout;
}

interface ConnectionWaiter {
	resolve: (transport: Transport) => void;
	reject: (reason: Error) => void;
	timer: NodeJS.Timeout;
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

function remainingUntil(deadline: number): number {
	return Math.max(0, deadline - Date.now());
}

/**
 * Request/response engine for the `!COMMAND` protocol over one shared
 * transport.
 *
 * Writes are serialised by a FIFO send mutex so at most one command is in
 * flight. The read side runs for as long as the transport is open: every
 * received line is classified, offered to the pending reply slot when it is
 * not an echo, and dispatched to subscribers when it is a state update.
 */
export class ProtocolEngine extends EventEmitter {
	private readonly endpoint: string;
	private readonly serial: SerialOptions;
	private readonly commandEol: string;
	private readonly responseEol: string;
	private readonly echoMarker: string;
	private readonly autoReconnect: boolean;
	private readonly reconnectInterval: number;
	private readonly transportFactory: TransportFactory;
	private readonly logger: Logger;
	private settings: Required<ProtocolEngineSettings>;

	private transport: Transport | null = null;
	private state: ConnectionState = ConnectionState.DISCONNECTED;
	private closed = false;
	private connectAttempt = 0;
	private reconnectTimeout: NodeJS.Timeout | null = null;
	private readBuffer = "";

	private pending: PendingRequest | null = null;
	private sendQueue: QueuedSender[] = [];
	private commandInFlight = false;
	private connectionWaiters = new Set<ConnectionWaiter>();

	private readonly throttle: Throttle;
	private readonly dispatcher: CallbackDispatcher;

	constructor(
		options: ProtocolEngineOptions,
		settings: ProtocolEngineSettings = {},
	) {
		super();

		this.endpoint = options.endpoint;
		this.serial = options.serial ?? {};
		this.commandEol = options.commandEol ?? COMMAND_EOL;
		this.responseEol = options.responseEol ?? RESPONSE_EOL;
		this.echoMarker = options.echoMarker ?? ECHO_MARKER;
		this.autoReconnect = options.autoReconnect ?? false;
		this.reconnectInterval = options.reconnectInterval ?? 5000;
		this.transportFactory = options.createTransport ?? createTransport;
		this.logger =
			options.logger ?? createLogger("ProtocolEngine", options.debug ?? false);

		if (this.responseEol.length === 0) {
			throw new RangeError("responseEol must not be empty");
		}

		this.settings = { ...DEFAULT_SETTINGS, ...settings };
		this.throttle = new Throttle(this.settings.minCommandIntervalMs);
		this.dispatcher = new CallbackDispatcher(this.logger);
	}

	// Safely override EventEmitter methods with strong types
	on<K extends keyof ProtocolEngineEvents>(
		event: K,
		listener: ProtocolEngineEvents[K],
	): this {
		return super.on(event, listener);
	}
	once<K extends keyof ProtocolEngineEvents>(
		event: K,
		listener: ProtocolEngineEvents[K],
	): this {
		return super.once(event, listener);
	}
	off<K extends keyof ProtocolEngineEvents>(
		event: K,
		listener: ProtocolEngineEvents[K],
	): this {
		return super.off(event, listener);
	}
	emit<K extends keyof ProtocolEngineEvents>(
		event: K,
		...args: Parameters<ProtocolEngineEvents[K]>
	): boolean {
		return super.emit(event, ...args);
	}

	/**
	 * Update protocol timing at runtime.
	 * @param newSettings Partial settings to override current values.
	 */
	public updateSettings(newSettings: ProtocolEngineSettings): void {
		this.settings = { ...this.settings, ...newSettings };
		this.throttle.setMinInterval(this.settings.minCommandIntervalMs);
	}

	public getSettings(): Required<ProtocolEngineSettings> {
		return { ...this.settings };
	}

	public getConnectionState(): ConnectionState {
		return this.state;
	}

	public connectivityState(): Connectivity {
		return this.state === ConnectionState.CONNECTED
			? "connected"
			: "disconnected";
	}

	private setState(state: ConnectionState): void {
		if (this.state === state) return;
		this.state = state;
		this.logger.debug(`Connection state: ${state}`);

		if (state === ConnectionState.CONNECTED && this.transport) {
			const transport = this.transport;
			for (const waiter of this.connectionWaiters) {
				clearTimeout(waiter.timer);
				waiter.resolve(transport);
			}
			this.connectionWaiters.clear();
		}

		this.emit("connectionStateChange", state);
	}

	/**
	 * Opens the transport.
	 * @returns Promise that resolves once commands can be sent.
	 * @throws ConnectionError if the transport cannot be opened.
	 */
	public async connect(): Promise<void> {
		if (this.transport || this.state === ConnectionState.CONNECTING) {
			this.logger.debug(`Connect called but already ${this.state}`);
			return;
		}

		if (this.reconnectTimeout) {
			clearTimeout(this.reconnectTimeout);
			this.reconnectTimeout = null;
		}

		this.closed = false;
		const attempt = ++this.connectAttempt;
		this.setState(ConnectionState.CONNECTING);

		let transport: Transport;
		try {
			transport = this.transportFactory(
				this.endpoint,
				this.serial,
				this.settings.connectTimeoutMs,
			);
			this.logger.info(`Connecting to ${transport.describe()}`);
			await transport.open();
		} catch (err) {
			this.setState(ConnectionState.DISCONNECTED);
			throw new ConnectionError(
				`Failed to connect to ${this.endpoint}: ${errorMessage(err)}`,
				{ endpoint: this.endpoint, cause: err },
			);
		}

		if (attempt !== this.connectAttempt) {
			// close() was called while the transport was opening
			await transport.close();
			throw new ConnectionError(
				`Connection to ${this.endpoint} was closed while connecting`,
				{ endpoint: this.endpoint },
			);
		}

		this.attach(transport);
		this.transport = transport;
		this.readBuffer = "";
		this.logger.debug(`Connected to ${transport.describe()}`);
		this.setState(ConnectionState.CONNECTED);
		this.emit("connect");
	}

	private attach(transport: Transport): void {
		const onData = (chunk: Buffer) => this.handleData(chunk);
		const onError = (err: Error) => {
			this.logger.warn(`Transport error on ${transport.describe()}: ${err.message}`);
		};
		const onClose = () => {
			transport.off("data", onData);
			transport.off("error", onError);
			transport.off("close", onClose);
			this.handleDisconnect(transport);
		};
		transport.on("data", onData);
		transport.on("error", onError);
		transport.on("close", onClose);
	}

	private handleDisconnect(transport: Transport): void {
		if (this.transport !== transport) return;

		this.transport = null;
		this.readBuffer = "";
		this.logger.warn(`Connection to ${transport.describe()} lost`);
		this.failPending(
			new ConnectionError(`Connection to ${transport.describe()} lost`, {
				endpoint: this.endpoint,
			}),
		);
		this.setState(ConnectionState.DISCONNECTED);
		this.emit("disconnect");

		if (this.autoReconnect && !this.closed) {
			this.scheduleReconnect();
		}
	}

	private scheduleReconnect(): void {
		this.setState(ConnectionState.RECONNECTING);
		this.reconnectTimeout = setTimeout(() => {
			this.reconnectTimeout = null;
			this.connect().catch((err: unknown) => {
				this.logger.warn(`Reconnect failed: ${errorMessage(err)}`);
				if (this.autoReconnect && !this.closed) {
					this.scheduleReconnect();
				}
			});
		}, this.reconnectInterval);
	}

	/**
	 * Closes the transport, disables reconnection and fails every waiting
	 * `send` with a ConnectionError. The engine may be connected again.
	 */
	public async close(): Promise<void> {
		this.closed = true;
		this.connectAttempt++;
		if (this.reconnectTimeout) {
			clearTimeout(this.reconnectTimeout);
			this.reconnectTimeout = null;
		}

		const error = new ConnectionError("Connection closed", {
			endpoint: this.endpoint,
		});
		this.failPending(error);
		for (const queued of this.sendQueue.splice(0)) {
			queued.reject(error);
		}
		for (const waiter of this.connectionWaiters) {
			clearTimeout(waiter.timer);
			waiter.reject(error);
		}
		this.connectionWaiters.clear();

		const transport = this.transport;
		this.transport = null;
		this.readBuffer = "";
		this.setState(ConnectionState.DISCONNECTED);

		if (transport) {
			try {
				await transport.close();
			} catch (err) {
				this.logger.warn(
					`Error closing ${transport.describe()}: ${errorMessage(err)}`,
				);
			}
			this.emit("disconnect");
		}
	}

	// --- SUBSCRIPTIONS ---

	/**
	 * Registers a handler for one kind of state update, or for all of them
	 * with `"any"`. Kind-specific handlers run before catch-all ones.
	 */
	public subscribe(
		kind: StateUpdateKind | "any",
		handler: StateUpdateHandler,
	): Subscription {
		return this.dispatcher.subscribe(kind, handler);
	}

	public unsubscribe(subscription: Subscription): boolean {
		return this.dispatcher.unsubscribe(subscription);
	}

	// --- SEND PATH ---

	private acquireSendSlot(
		command: string,
		timeoutMs: number,
		deadline: number,
	): Promise<() => void> {
		return new Promise((resolve, reject) => {
			let released = false;
			const release = () => {
				if (released) return;
				released = true;
				this.commandInFlight = false;
				this.dequeueNextCommand();
			};
			const queued: QueuedSender = {
				grant: () => {
					clearTimeout(queued.timer);
					resolve(release);
				},
				reject: (reason) => {
					clearTimeout(queued.timer);
					reject(reason);
				},
				timer: setTimeout(() => {
					const index = this.sendQueue.indexOf(queued);
					if (index === -1) return;
					this.sendQueue.splice(index, 1);
					this.logger.warn(
						`Timeout waiting to send ${command}: send slot still busy (${timeoutMs}ms)`,
					);
					reject(new TimeoutError(command, timeoutMs, ""));
				}, remainingUntil(deadline)),
			};
			this.sendQueue.push(queued);
			if (!this.commandInFlight) {
				this.dequeueNextCommand();
			}
		});
	}

	private dequeueNextCommand(): void {
		if (!this.commandInFlight && this.sendQueue.length > 0) {
			const next = this.sendQueue.shift();
			if (next) {
				this.commandInFlight = true;
				next.grant();
			}
		}
	}

	private waitForConnection(
		timeoutMs: number,
		onTimeout: () => Error,
	): Promise<Transport> {
		if (this.transport && this.state === ConnectionState.CONNECTED) {
			return Promise.resolve(this.transport);
		}
		if (this.closed) {
			return Promise.reject(
				new ConnectionError("Connection closed", { endpoint: this.endpoint }),
			);
		}

		this.logger.debug(`Waiting up to ${timeoutMs}ms for connection (${this.state})`);
		return new Promise((resolve, reject) => {
			const waiter: ConnectionWaiter = {
				resolve,
				reject,
				timer: setTimeout(() => {
					this.connectionWaiters.delete(waiter);
					reject(onTimeout());
				}, timeoutMs),
			};
			this.connectionWaiters.add(waiter);
		});
	}

	private openPendingRequest(
		command: string,
		timeoutMs: number,
		waitMs: number,
	): Promise<string> {
		return new Promise((resolve, reject) => {
			const pending: PendingRequest = {
				command,
				received: "",
				resolve,
				reject,
				timer: setTimeout(() => {
					if (this.pending !== pending) return;
					this.pending = null;
					this.logger.warn(
						`Timeout waiting for response to ${command}: received=${JSON.stringify(pending.received)} (${timeoutMs}ms)`,
					);
					reject(new TimeoutError(command, timeoutMs, pending.received));
				}, waitMs),
			};
			this.pending = pending;
		});
	}

	private settlePending(line: string): void {
		const pending = this.pending;
		if (!pending) return;
		this.pending = null;
		clearTimeout(pending.timer);
		pending.resolve(line);
	}

	private failPending(error: Error): void {
		const pending = this.pending;
		if (!pending) return;
		this.pending = null;
		clearTimeout(pending.timer);
		pending.reject(error);
	}

	private assertCurrent(transport: Transport, command: string): void {
		if (this.transport !== transport) {
			throw new ConnectionError(
				`Connection to ${this.endpoint} lost before ${command} was sent`,
				{ endpoint: this.endpoint, command },
			);
		}
	}

	/**
	 * Sends one command, optionally waiting for its reply.
	 *
	 * `timeoutMs` bounds the whole call: waiting for the send slot, for a
	 * connection, for the throttle and for the reply.
	 *
	 * @param command The command without terminator, e.g. `!VOL?`
	 * @param waitForReply Whether to wait for the first non-echo reply line
	 * @param timeoutMs Deadline for the call
	 * @returns The reply line, or undefined when not waiting for one
	 * @throws TimeoutError when the deadline passes first
	 * @throws ConnectionError when the transport is unavailable, lost or closed
	 */
	public async send(
		command: string,
		waitForReply = true,
		timeoutMs: number = this.settings.commandTimeoutMs,
	): Promise<string | undefined> {
		const deadline = Date.now() + timeoutMs;
		const release = await this.acquireSendSlot(command, timeoutMs, deadline);
		try {
			const connectWaitMs = this.settings.connectTimeoutMs;
			const remaining = remainingUntil(deadline);
			const transport = await this.waitForConnection(
				Math.min(connectWaitMs, remaining),
				() =>
					remaining < connectWaitMs
						? new TimeoutError(command, timeoutMs, "")
						: new ConnectionError(
								`Not connected to ${this.endpoint} after ${connectWaitMs}ms (state: ${this.state})`,
								{ endpoint: this.endpoint, state: this.state },
							),
			);

			const waited = await this.throttle.beforeSend();
			if (waited > 0) {
				this.logger.debug(`Throttling: waited ${waited}ms before ${command}`);
			}
			this.assertCurrent(transport, command);

			// Drop anything received before this command so it cannot pose as the reply
			if (this.readBuffer.length > 0) {
				this.logger.debug(
					`Discarding stale input: ${JSON.stringify(this.readBuffer)}`,
				);
				this.readBuffer = "";
			}
			try {
				await transport.clearBuffers();
			} catch (err) {
				throw new ConnectionError(
					`Clearing buffers of ${transport.describe()} failed: ${errorMessage(err)}`,
					{ endpoint: this.endpoint, command, cause: err },
				);
			}
			this.assertCurrent(transport, command);

			if (remainingUntil(deadline) === 0) {
				throw new TimeoutError(command, timeoutMs, "");
			}

			const reply = waitForReply
				? this.openPendingRequest(command, timeoutMs, remainingUntil(deadline))
				: null;

			this.logger.debug(`>>> TX: ${command}`);
			this.throttle.markSent();
			const written = transport
				.write(`${command}${this.commandEol}`)
				.catch((err: unknown) => {
					const error = new ConnectionError(
						`Write to ${transport.describe()} failed: ${errorMessage(err)}`,
						{ endpoint: this.endpoint, command, cause: err },
					);
					this.failPending(error);
					throw error;
				});

			if (!reply) {
				await written;
				return undefined;
			}
			const [, line] = await Promise.all([written, reply]);
			return line;
		} finally {
			release();
		}
	}

	// --- READ PATH ---

	private handleData(chunk: Buffer): void {
		const text = chunk.toString("latin1");
		this.logger.debug(`<<< RX: ${JSON.stringify(text)}`);

		if (this.pending) {
			this.pending.received += text;
		}

		this.readBuffer += text;
		const { lines, rest } = splitLines(this.readBuffer, this.responseEol);
		this.readBuffer = rest;

		let replyTaken = false;
		for (const line of lines) {
			try {
				replyTaken = this.processLine(line, replyTaken);
			} catch (err) {
				this.logger.error(`Error processing line ${JSON.stringify(line)}:`, err);
			}
		}
	}

	/**
	 * Offers one line to the reply slot and to the dispatcher, then raises
	 * the engine's own events.
	 * @returns Whether a reply has been taken from the current chunk
	 */
	private processLine(line: string, replyTaken: boolean): boolean {
		const malformed = validateLine(line);
		if (malformed) {
			this.logger.warn(`${malformed.message}: ${JSON.stringify(line)}`);
			this.safeEmit("protocolError", malformed);
			return replyTaken;
		}

		const message = classifyLine(line, this.echoMarker);

		let taken = replyTaken;
		if (message.type !== "echo") {
			if (this.pending) {
				this.logger.debug(`Reply to ${this.pending.command}: ${line}`);
				this.settlePending(line);
				taken = true;
			} else if (replyTaken) {
				this.logger.debug(`Multiple response lines, using first; extra: ${line}`);
			}
		}

		if (message.type === "stateUpdate") {
			this.logger.debug(`State update: ${message.kind}`, message.fields);
			this.dispatcher.dispatch(message);
		}

		this.safeEmit("line", message);
		if (message.type === "stateUpdate") {
			this.safeEmit("stateUpdate", message);
		}

		return taken;
	}

	/**
	 * Emits an engine event; a listener that throws is logged and does not
	 * reach the read path.
	 */
	private safeEmit<K extends keyof ProtocolEngineEvents>(
		event: K,
		...args: Parameters<ProtocolEngineEvents[K]>
	): void {
		try {
			this.emit(event, ...args);
		} catch (err) {
			this.logger.error(`Error in ${event} listener:`, err);
		}
	}
}
