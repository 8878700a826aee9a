// tests/engine.test.ts

import { ProtocolEngine } from "../src/engine";
import { ConnectionError, ProtocolError, TimeoutError } from "../src/errors";
import {
	type ClassifiedMessage,
	ConnectionState,
	type ProtocolEngineOptions,
	type ProtocolEngineSettings,
} from "../src/types";
import {
	createTestLogger,
	FakeTransport,
	TEST_SETTINGS,
	waitFor,
	waitForEvent,
} from "./setup";

describe("⚙️ ProtocolEngine", () => {
	let transport: FakeTransport;
	let engines: ProtocolEngine[];

	const createEngine = (
		options: Partial<ProtocolEngineOptions> = {},
		settings: ProtocolEngineSettings = TEST_SETTINGS,
	) => {
		const logger = createTestLogger();
		const engine = new ProtocolEngine(
			{
				endpoint: "fake://device",
				logger,
				createTransport: () => transport,
				...options,
			},
			settings,
		);
		engines.push(engine);
		return { engine, logger };
	};

	beforeEach(() => {
		transport = new FakeTransport();
		engines = [];
	});

	afterEach(async () => {
		for (const engine of engines) {
			await engine.close();
		}
	});

	describe("Connection Management", () => {
		test("should connect through the transport factory", async () => {
			const { engine } = createEngine();
			const states: ConnectionState[] = [];
			engine.on("connectionStateChange", (state) => states.push(state));
			const connected = waitForEvent(engine, "connect");

			await engine.connect();
			await connected;

			expect(transport.openCount).toBe(1);
			expect(engine.getConnectionState()).toBe(ConnectionState.CONNECTED);
			expect(engine.connectivityState()).toBe("connected");
			expect(states).toEqual([
				ConnectionState.CONNECTING,
				ConnectionState.CONNECTED,
			]);
		});

		test("should ignore a second connect", async () => {
			const { engine } = createEngine();
			await engine.connect();
			await engine.connect();
			expect(transport.openCount).toBe(1);
		});

		test("should fail with ConnectionError when the transport cannot open", async () => {
			const { engine } = createEngine();
			transport.failOpen = new Error("refused");

			await expect(engine.connect()).rejects.toThrow(
				new ConnectionError("Failed to connect to fake://device: refused"),
			);
			expect(engine.getConnectionState()).toBe(ConnectionState.DISCONNECTED);
			expect(engine.connectivityState()).toBe("disconnected");
		});

		test("should emit disconnect and go idle on close", async () => {
			const { engine } = createEngine();
			await engine.connect();
			const disconnected = waitForEvent(engine, "disconnect");

			await engine.close();
			await disconnected;

			expect(transport.isOpen).toBe(false);
			expect(engine.getConnectionState()).toBe(ConnectionState.DISCONNECTED);
		});

		test("should reconnect after the connection is lost", async () => {
			const { engine } = createEngine({
				autoReconnect: true,
				reconnectInterval: 20,
			});
			await engine.connect();
			const states: ConnectionState[] = [];
			engine.on("connectionStateChange", (state) => states.push(state));

			transport.drop();
			await waitFor(() => transport.openCount === 2);

			expect(engine.getConnectionState()).toBe(ConnectionState.CONNECTED);
			expect(states).toEqual([
				ConnectionState.DISCONNECTED,
				ConnectionState.RECONNECTING,
				ConnectionState.CONNECTING,
				ConnectionState.CONNECTED,
			]);
		});

		test("should apply runtime settings", () => {
			const { engine } = createEngine();
			engine.updateSettings({ commandTimeoutMs: 750 });
			expect(engine.getSettings()).toEqual({
				minCommandIntervalMs: 5,
				commandTimeoutMs: 750,
				connectTimeoutMs: 100,
			});
		});
	});

	describe("Request / Response", () => {
		test("should skip the echo and resolve with the reply line", async () => {
			const { engine } = createEngine();
			transport.respond = (command) =>
				command === "!VOL(-350)" ? ["#!VOL(-350)", "!VOL(-350)"] : null;
			await engine.connect();

			await expect(engine.send("!VOL(-350)")).resolves.toBe("!VOL(-350)");
			expect(transport.writes.map((w) => w.data)).toEqual(["!VOL(-350)\r"]);
		});

		test("should also dispatch a reply that is a state update", async () => {
			const { engine } = createEngine();
			transport.respond = () => "!VOL(-350)";
			const handler = jest.fn();
			engine.subscribe("volume", handler);
			await engine.connect();

			await engine.send("!VOL?");

			expect(handler).toHaveBeenCalledTimes(1);
			expect(handler).toHaveBeenCalledWith(
				expect.objectContaining({ fields: { value: -350, db: -35 } }),
			);
		});

		test("should resolve without reading when no reply is wanted", async () => {
			const { engine } = createEngine();
			await engine.connect();

			await expect(engine.send("!POWERONMAIN", false)).resolves.toBeUndefined();
			expect(transport.commands).toEqual(["!POWERONMAIN"]);
		});

		test("should use the first reply line and log the rest", async () => {
			const { engine, logger } = createEngine();
			transport.respond = () => ["!VOL(-350)", "!MUTEON"];
			const muteHandler = jest.fn();
			engine.subscribe("mute", muteHandler);
			await engine.connect();

			await expect(engine.send("!VOL?")).resolves.toBe("!VOL(-350)");

			expect(muteHandler).toHaveBeenCalledTimes(1);
			expect(logger.debug).toHaveBeenCalledWith(
				"Multiple response lines, using first; extra: !MUTEON",
			);
		});

		test("should time out with the text received so far", async () => {
			const { engine } = createEngine();
			transport.respond = () => "#!PING?";
			await engine.connect();

			const error = await engine.send("!PING?", true, 50).catch((e: unknown) => e);

			expect(error).toBeInstanceOf(TimeoutError);
			expect(error).toMatchObject({
				code: "TIMEOUT",
				command: "!PING?",
				timeoutMs: 50,
				partial: "#!PING?\r",
			});
		});

		test("should release the send slot after a timeout", async () => {
			const { engine } = createEngine();
			await engine.connect();

			await expect(engine.send("!PING?", true, 30)).rejects.toBeInstanceOf(
				TimeoutError,
			);

			transport.respond = () => "!PONG";
			await expect(engine.send("!PING?")).resolves.toBe("!PONG");
		});

		test("should not take a late reply as the next command's reply", async () => {
			const { engine } = createEngine();
			await engine.connect();
			await expect(engine.send("!DEVICE?", true, 30)).rejects.toBeInstanceOf(
				TimeoutError,
			);

			transport.push("!DEVICE(MP-60)\r");
			transport.respond = () => "!PONG";

			await expect(engine.send("!PING?")).resolves.toBe("!PONG");
		});

		test("should discard a stale partial line before writing", async () => {
			const { engine } = createEngine();
			await engine.connect();
			transport.push("!VOL(-4");
			transport.respond = () => "!MUTEON";

			await expect(engine.send("!MUTE?")).resolves.toBe("!MUTEON");
			expect(transport.clearCount).toBe(1);
		});

		test("should wait for a connection before sending", async () => {
			const { engine } = createEngine();
			transport.respond = () => "!PONG";

			const reply = engine.send("!PING?");
			await engine.connect();

			await expect(reply).resolves.toBe("!PONG");
		});

		test("should fail when no connection appears in time", async () => {
			const { engine } = createEngine();

			await expect(engine.send("!PING?")).rejects.toThrow(
				new ConnectionError(
					"Not connected to fake://device after 100ms (state: disconnected)",
				),
			);
			expect(transport.writes).toHaveLength(0);
		});

		test("should fail with ConnectionError when the write fails", async () => {
			const { engine } = createEngine();
			await engine.connect();
			transport.failWrite = new Error("EIO");

			await expect(engine.send("!PING?")).rejects.toThrow(
				new ConnectionError("Write to fake://device failed: EIO"),
			);
		});

		test("should fail with ConnectionError when clearing buffers fails", async () => {
			const { engine } = createEngine();
			await engine.connect();
			const cause = new Error("flush EIO");
			transport.failClear = cause;

			const error = await engine.send("!PING?").catch((e: unknown) => e);

			expect(error).toBeInstanceOf(ConnectionError);
			expect(error).toMatchObject({
				message: "Clearing buffers of fake://device failed: flush EIO",
				details: { endpoint: "fake://device", command: "!PING?", cause },
			});
			expect(transport.writes).toHaveLength(0);

			transport.failClear = null;
			transport.respond = () => "!PONG";
			await expect(engine.send("!PING?")).resolves.toBe("!PONG");
		});

		test("should bound the connection wait by the caller's timeout", async () => {
			const { engine } = createEngine();

			const error = await engine.send("!PING?", true, 30).catch((e: unknown) => e);

			expect(error).toBeInstanceOf(TimeoutError);
			expect(error).toMatchObject({ command: "!PING?", timeoutMs: 30, partial: "" });
			expect(transport.writes).toHaveLength(0);
		});
	});

	describe("Concurrency", () => {
		test("should serialise concurrent sends in FIFO order", async () => {
			const { engine } = createEngine();
			transport.respond = (command) => `${command.slice(0, -1)}(ok)`;
			await engine.connect();

			const replies = await Promise.all([
				engine.send("!A?"),
				engine.send("!B?"),
				engine.send("!C?"),
			]);

			expect(replies).toEqual(["!A(ok)", "!B(ok)", "!C(ok)"]);
			expect(transport.commands).toEqual(["!A?", "!B?", "!C?"]);
			expect(transport.maxConcurrentWrites).toBe(1);
		});

		test("should not write the next command before the reply", async () => {
			const { engine } = createEngine();
			await engine.connect();

			const first = engine.send("!A?");
			const second = engine.send("!B?", false);
			await waitFor(() => transport.writes.length === 1);
			await new Promise((resolve) => setTimeout(resolve, 30));
			expect(transport.commands).toEqual(["!A?"]);

			transport.push("!A(1)\r");
			await expect(first).resolves.toBe("!A(1)");
			await second;
			expect(transport.commands).toEqual(["!A?", "!B?"]);
		});

		test("should keep the minimum interval between writes", async () => {
			const { engine } = createEngine(
				{},
				{ ...TEST_SETTINGS, minCommandIntervalMs: 40 },
			);
			await engine.connect();

			await engine.send("!VOL+", false);
			await engine.send("!VOL+", false);

			const [first, second] = transport.writes;
			// Each write is stamped just after the throttle records it
			expect(second.at - first.at).toBeGreaterThanOrEqual(39);
		});

		test("should fail the pending send when the connection is lost", async () => {
			const { engine } = createEngine();
			await engine.connect();
			const disconnected = waitForEvent(engine, "disconnect");

			const pending = engine.send("!VOL?");
			const failed = expect(pending).rejects.toThrow(
				new ConnectionError("Connection to fake://device lost"),
			);
			await waitFor(() => transport.writes.length === 1);
			transport.drop();

			await failed;
			await disconnected;
			expect(engine.getConnectionState()).toBe(ConnectionState.DISCONNECTED);
		});

		test("should time out a send still waiting for the send slot", async () => {
			const { engine } = createEngine();
			await engine.connect();

			const first = engine.send("!A?", true, 150).catch((e: unknown) => e);
			await waitFor(() => transport.writes.length === 1);
			const startedAt = Date.now();
			const second = await engine
				.send("!B?", true, 40)
				.catch((e: unknown) => e);

			expect(Date.now() - startedAt).toBeLessThan(120);
			expect(second).toBeInstanceOf(TimeoutError);
			expect(second).toMatchObject({ command: "!B?", timeoutMs: 40, partial: "" });

			expect(await first).toBeInstanceOf(TimeoutError);
			expect(transport.commands).toEqual(["!A?"]);

			transport.respond = () => "!C(1)";
			await expect(engine.send("!C?")).resolves.toBe("!C(1)");
			expect(transport.commands).toEqual(["!A?", "!C?"]);
		});

		test("should reject queued sends on close", async () => {
			const { engine } = createEngine();
			await engine.connect();

			const inFlight = engine.send("!A?");
			const queued = engine.send("!B?");
			const results = Promise.all([
				expect(inFlight).rejects.toThrow(new ConnectionError("Connection closed")),
				expect(queued).rejects.toThrow(new ConnectionError("Connection closed")),
			]);
			await waitFor(() => transport.writes.length === 1);

			await engine.close();
			await results;
			expect(transport.commands).toEqual(["!A?"]);
		});
	});

	describe("Unsolicited Messages", () => {
		test("should deliver to kind handlers before catch-all handlers", async () => {
			const { engine } = createEngine();
			await engine.connect();
			const calls: string[] = [];
			engine.subscribe("any", (update) => {
				calls.push(`any:${update.kind}`);
			});
			engine.subscribe("volume", (update) => {
				calls.push(`volume:${update.line}`);
			});

			transport.push("!VOL(-300)\r");

			expect(calls).toEqual(["volume:!VOL(-300)", "any:volume"]);
		});

		test("should emit stateUpdate events", async () => {
			const { engine } = createEngine();
			await engine.connect();
			const update = waitForEvent(engine, "stateUpdate");

			transport.push('!SRC(2)"TV"\r');

			await expect(update).resolves.toMatchObject({
				kind: "source",
				fields: { index: 2, name: "TV" },
			});
		});

		test("should reassemble lines split across chunks", async () => {
			const { engine } = createEngine();
			await engine.connect();
			const handler = jest.fn();
			engine.subscribe("lipsync", handler);

			transport.push("!LIPS");
			transport.push("YNC(30)\r");

			expect(handler).toHaveBeenCalledTimes(1);
			expect(handler.mock.calls[0][0].fields).toEqual({ ms: 30 });
		});

		test("should never dispatch echo lines", async () => {
			const { engine } = createEngine();
			await engine.connect();
			const handler = jest.fn();
			const lines: ClassifiedMessage[] = [];
			engine.subscribe("any", handler);
			engine.on("line", (message) => lines.push(message));

			transport.push("#!VOL(-350)\r");

			expect(handler).not.toHaveBeenCalled();
			expect(lines).toEqual([{ type: "echo", line: "#!VOL(-350)" }]);
		});

		test("should drop malformed lines and keep reading", async () => {
			const { engine, logger } = createEngine();
			transport.respond = () => ["!VOL(\x01)", "!VOL(-100)"];
			const errors: ProtocolError[] = [];
			engine.on("protocolError", (error) => errors.push(error));
			await engine.connect();

			await expect(engine.send("!VOL?")).resolves.toBe("!VOL(-100)");

			expect(errors).toHaveLength(1);
			expect(errors[0].line).toBe("!VOL(\x01)");
			expect(logger.warn).toHaveBeenCalledWith(
				'Malformed line: non-printable byte 0x01 at offset 5: "!VOL(\\u0001)"',
			);
		});

		test("should keep dispatching when a handler throws", async () => {
			const { engine, logger } = createEngine();
			await engine.connect();
			const after = jest.fn();
			engine.subscribe("power", () => {
				throw new Error("handler failed");
			});
			engine.subscribe("power", after);

			transport.push("!POWER(1)\r!POWER(0)\r");

			expect(after).toHaveBeenCalledTimes(2);
			expect(logger.error).toHaveBeenCalledTimes(2);
		});

		test("should deliver a reply when a line listener throws", async () => {
			const { engine, logger } = createEngine();
			transport.respond = () => "!VOL(-350)";
			const listenerError = new Error("listener failed");
			engine.on("line", () => {
				throw listenerError;
			});
			await engine.connect();

			await expect(engine.send("!VOL?")).resolves.toBe("!VOL(-350)");
			expect(logger.error).toHaveBeenCalledWith(
				"Error in line listener:",
				listenerError,
			);
		});

		test("should dispatch to subscribers when a stateUpdate listener throws", async () => {
			const { engine, logger } = createEngine();
			await engine.connect();
			const volumes: number[] = [];
			engine.on("stateUpdate", () => {
				throw new Error("listener failed");
			});
			engine.subscribe("volume", (update) => {
				if (update.kind === "volume") volumes.push(update.fields.value);
			});

			transport.push("!VOL(-300)\r!VOL(-290)\r");

			expect(volumes).toEqual([-300, -290]);
			expect(logger.error).toHaveBeenCalledTimes(2);
		});

		test("should stop delivering after unsubscribe", async () => {
			const { engine } = createEngine();
			await engine.connect();
			const handler = jest.fn();
			const subscription = engine.subscribe("mute", handler);

			transport.push("!MUTEON\r");
			expect(engine.unsubscribe(subscription)).toBe(true);
			transport.push("!MUTEOFF\r");

			expect(handler).toHaveBeenCalledTimes(1);
		});
	});
});
