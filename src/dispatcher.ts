// src/dispatcher.ts

import type { Logger } from "./logger";
import type {
	StateUpdate,
	StateUpdateHandler,
	StateUpdateKind,
	Subscription,
} from "./types";

interface Registration {
	subscription: Subscription;
	handler: StateUpdateHandler;
}

/**
 * Registry of state update subscribers.
 *
 * Handlers for a specific kind run before the catch-all (`"any"`) handlers,
 * each group in registration order. Every invocation is isolated: a throwing
 * handler or a rejected promise is logged and the next handler still runs.
 * Promises returned by handlers are never awaited.
 */
export class CallbackDispatcher {
	private registrations = new Map<StateUpdateKind | "any", Registration[]>();
	private nextId = 1;

	constructor(private readonly logger: Logger) {}

	public subscribe(
		kind: StateUpdateKind | "any",
		handler: StateUpdateHandler,
	): Subscription {
		const subscription: Subscription = { id: this.nextId++, kind };
		const list = this.registrations.get(kind) ?? [];
		// Copy on write, so a dispatch in progress keeps its snapshot
		this.registrations.set(kind, [...list, { subscription, handler }]);
		this.logger.debug(`Registered callback #${subscription.id} for ${kind}`);
		return subscription;
	}

	/**
	 * @returns false if the subscription was not registered
	 */
	public unsubscribe(subscription: Subscription): boolean {
		const list = this.registrations.get(subscription.kind);
		if (!list) return false;
		const remaining = list.filter(
			(r) => r.subscription.id !== subscription.id,
		);
		if (remaining.length === list.length) return false;
		if (remaining.length === 0) {
			this.registrations.delete(subscription.kind);
		} else {
			this.registrations.set(subscription.kind, remaining);
		}
		return true;
	}

	public listenerCount(kind?: StateUpdateKind | "any"): number {
		if (kind !== undefined) {
			return this.registrations.get(kind)?.length ?? 0;
		}
		let count = 0;
		for (const list of this.registrations.values()) count += list.length;
		return count;
	}

	public clear(): void {
		this.registrations.clear();
	}

	/**
	 * Delivers an update to its kind's handlers, then to the catch-all ones.
	 * @returns The number of handlers invoked
	 */
	public dispatch(update: StateUpdate): number {
		const specific = this.registrations.get(update.kind) ?? [];
		const catchAll = this.registrations.get("any") ?? [];
		for (const registration of specific) {
			this.invoke(registration, update);
		}
		for (const registration of catchAll) {
			this.invoke(registration, update);
		}
		return specific.length + catchAll.length;
	}

	private invoke(registration: Registration, update: StateUpdate): void {
		const { subscription } = registration;
		try {
			const result = registration.handler(update);
			if (result instanceof Promise) {
				result.catch((err: unknown) => {
					this.logger.error(
						`Error in ${subscription.kind} callback #${subscription.id} for ${update.kind}:`,
						err,
					);
				});
			}
		} catch (err) {
			this.logger.error(
				`Error in ${subscription.kind} callback #${subscription.id} for ${update.kind}:`,
				err,
			);
		}
	}
}
