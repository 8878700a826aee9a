// src/throttle.ts

/**
 * Enforces a minimum interval between writes on one connection.
 * Serialisation of callers is the send mutex's job, not this class's.
 */
export class Throttle {
	private lastSend = 0;

	constructor(
		private minIntervalMs: number,
		private readonly now: () => number = Date.now,
	) {}

	public setMinInterval(ms: number): void {
		this.minIntervalMs = ms;
	}

	public getMinInterval(): number {
		return this.minIntervalMs;
	}

	/**
	 * Milliseconds left before the next write is allowed.
	 */
	public remaining(): number {
		return Math.max(0, this.lastSend + this.minIntervalMs - this.now());
	}

	/**
	 * Resolves once the minimum interval since the last write has elapsed.
	 * Timers may fire a millisecond early, so the gap is checked again.
	 * @returns The total time spent waiting, in ms
	 */
	public async beforeSend(): Promise<number> {
		let waited = 0;
		let delay = this.remaining();
		while (delay > 0) {
			await new Promise((resolve) => setTimeout(resolve, delay));
			waited += delay;
			delay = this.remaining();
		}
		return waited;
	}

	public markSent(): void {
		this.lastSend = this.now();
	}

	public reset(): void {
		this.lastSend = 0;
	}
}
