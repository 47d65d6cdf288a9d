/**
 * Bounded retry with a fixed delay between attempts.
 *
 * The policy only counts and schedules; the caller reports the outcome of
 * each attempt by calling reset() on success or schedule() again on failure.
 */

export type TimerHandle = ReturnType<typeof setTimeout>;

export interface Timers {
	setTimeout(callback: () => void, ms: number): TimerHandle;
	clearTimeout(handle: TimerHandle): void;
}

export const defaultTimers: Timers = {
	setTimeout: (callback, ms) => setTimeout(callback, ms),
	clearTimeout: (handle) => clearTimeout(handle)
};

export interface RetryOptions {
	maxAttempts: number;
	delayMs: number;
	timers?: Timers;
}

export class BoundedRetry {
	readonly maxAttempts: number;
	readonly delayMs: number;
	private readonly timers: Timers;
	private count = 0;
	private pending: TimerHandle | null = null;

	constructor(options: RetryOptions) {
		this.maxAttempts = options.maxAttempts;
		this.delayMs = options.delayMs;
		this.timers = options.timers ?? defaultTimers;
	}

	/** Attempts scheduled since the last reset */
	get attempts(): number {
		return this.count;
	}

	get exhausted(): boolean {
		return this.count >= this.maxAttempts;
	}

	get isPending(): boolean {
		return this.pending !== null;
	}

	/**
	 * Schedule the next attempt after the fixed delay.
	 * Returns false, scheduling nothing, when attempts are exhausted or one
	 * is already pending.
	 */
	schedule(attempt: (attemptNumber: number) => void): boolean {
		if (this.exhausted || this.pending !== null) return false;

		this.count++;
		const attemptNumber = this.count;
		this.pending = this.timers.setTimeout(() => {
			this.pending = null;
			attempt(attemptNumber);
		}, this.delayMs);
		return true;
	}

	/** Cancel a pending attempt without touching the counter */
	cancel(): void {
		if (this.pending !== null) {
			this.timers.clearTimeout(this.pending);
			this.pending = null;
		}
	}

	/** Cancel and start counting from zero again */
	reset(): void {
		this.cancel();
		this.count = 0;
	}
}
