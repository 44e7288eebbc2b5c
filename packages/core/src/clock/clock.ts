/**
 * Clock
 *
 * Time source used to stamp example execution results.
 * Timestamps are epoch milliseconds so reporters can use them directly.
 */

/**
 * Clock capability
 */
export interface Clock {
	/** Current timestamp in milliseconds */
	now(): number;
}

/**
 * Wall clock backed by Date.now()
 */
export class SystemClock implements Clock {
	now(): number {
		return Date.now();
	}
}

/**
 * Manually driven clock.
 *
 * Time only moves when advance() or set() is called.
 */
export class FakeClock implements Clock {
	private current: number;

	constructor(start = 0) {
		this.current = start;
	}

	now(): number {
		return this.current;
	}

	/**
	 * Move time forward by the given number of milliseconds
	 */
	advance(ms: number): void {
		if (ms < 0) {
			throw new RangeError(`FakeClock cannot move backwards (advance by ${ms}ms)`);
		}
		this.current += ms;
	}

	/**
	 * Jump to an absolute timestamp (must not be in the past)
	 */
	set(timestamp: number): void {
		if (timestamp < this.current) {
			throw new RangeError(`FakeClock cannot move backwards (from ${this.current} to ${timestamp})`);
		}
		this.current = timestamp;
	}
}

/**
 * Shared default clock
 */
export const systemClock: Clock = new SystemClock();
