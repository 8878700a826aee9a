// tests/dispatcher.test.ts

import { CallbackDispatcher } from "../src/dispatcher";
import { parseStateUpdate } from "../src/protocol";
import type { StateUpdate } from "../src/types";
import { createTestLogger, waitFor } from "./setup";

function update(line: string): StateUpdate {
	const parsed = parseStateUpdate(line);
	if (!parsed) throw new Error(`Not a state update: ${line}`);
	return parsed;
}

describe("🔔 CallbackDispatcher", () => {
	test("should call kind handlers before catch-all handlers", () => {
		const dispatcher = new CallbackDispatcher(createTestLogger());
		const calls: string[] = [];

		dispatcher.subscribe("any", () => {
			calls.push("any");
		});
		dispatcher.subscribe("volume", () => {
			calls.push("volume-1");
		});
		dispatcher.subscribe("volume", () => {
			calls.push("volume-2");
		});
		dispatcher.subscribe("mute", () => {
			calls.push("mute");
		});

		const invoked = dispatcher.dispatch(update("!VOL(-300)"));

		expect(invoked).toBe(3);
		expect(calls).toEqual(["volume-1", "volume-2", "any"]);
	});

	test("should pass the typed update to handlers", () => {
		const dispatcher = new CallbackDispatcher(createTestLogger());
		const handler = jest.fn();
		dispatcher.subscribe("volume", handler);

		dispatcher.dispatch(update("!VOL(-300)"));

		expect(handler).toHaveBeenCalledWith(
			expect.objectContaining({
				kind: "volume",
				fields: { value: -300, db: -30 },
			}),
		);
	});

	test("should keep delivering after a handler throws", () => {
		const logger = createTestLogger();
		const dispatcher = new CallbackDispatcher(logger);
		const after = jest.fn();

		const failing = dispatcher.subscribe("power", () => {
			throw new Error("boom");
		});
		dispatcher.subscribe("power", after);

		expect(() => dispatcher.dispatch(update("!POWER(1)"))).not.toThrow();
		expect(after).toHaveBeenCalledTimes(1);
		expect(logger.error).toHaveBeenCalledWith(
			`Error in power callback #${failing.id} for power:`,
			expect.any(Error),
		);
	});

	test("should log rejected async handlers without awaiting them", async () => {
		const logger = createTestLogger();
		const dispatcher = new CallbackDispatcher(logger);
		const after = jest.fn();

		dispatcher.subscribe("any", async () => {
			throw new Error("async boom");
		});
		dispatcher.subscribe("any", after);

		dispatcher.dispatch(update("!MUTEON"));
		expect(after).toHaveBeenCalledTimes(1);

		await waitFor(() => logger.error.mock.calls.length > 0);
		expect(logger.error.mock.calls[0][0]).toBe(
			"Error in any callback #1 for mute:",
		);
	});

	test("should stop calling an unsubscribed handler", () => {
		const dispatcher = new CallbackDispatcher(createTestLogger());
		const handler = jest.fn();
		const subscription = dispatcher.subscribe("lipsync", handler);

		expect(dispatcher.unsubscribe(subscription)).toBe(true);
		expect(dispatcher.unsubscribe(subscription)).toBe(false);
		dispatcher.dispatch(update("!LIPSYNC(20)"));

		expect(handler).not.toHaveBeenCalled();
		expect(dispatcher.listenerCount("lipsync")).toBe(0);
	});

	test("should let a handler unsubscribe during dispatch", () => {
		const dispatcher = new CallbackDispatcher(createTestLogger());
		const second = jest.fn();
		const first = dispatcher.subscribe("loudness", () => {
			dispatcher.unsubscribe(first);
		});
		dispatcher.subscribe("loudness", second);

		dispatcher.dispatch(update("!LOUDNESS(0)"));
		dispatcher.dispatch(update("!LOUDNESS(1)"));

		expect(second).toHaveBeenCalledTimes(2);
		expect(dispatcher.listenerCount()).toBe(1);
	});

	test("should drop every registration on clear", () => {
		const dispatcher = new CallbackDispatcher(createTestLogger());
		dispatcher.subscribe("any", jest.fn());
		dispatcher.subscribe("source", jest.fn());

		dispatcher.clear();

		expect(dispatcher.listenerCount()).toBe(0);
		expect(dispatcher.dispatch(update('!SRC(1)"TV"'))).toBe(0);
	});
});
