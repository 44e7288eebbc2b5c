/**
 * Execution Result
 *
 * Timestamps and final status of one example run.
 */

import { ExampleStateError } from "./errors";

/**
 * Example status. Moves only forward:
 * notStarted -> started -> passed | failed | pending
 */
export type ExampleStatus = "notStarted" | "started" | "passed" | "failed" | "pending";

/**
 * Status an example ends in
 */
export type TerminalStatus = Extract<ExampleStatus, "passed" | "failed" | "pending">;

/**
 * Plain snapshot of an execution result (for JSON output)
 */
export interface ExecutionResultData {
	status: ExampleStatus;
	startedAt?: number;
	finishedAt?: number;
	runTime?: number;
	pendingMessage?: string;
	pendingFixed?: boolean;
	pendingException?: string;
	exception?: string;
}

export class ExecutionResult {
	private _status: ExampleStatus = "notStarted";
	private _startedAt?: number;
	private _finishedAt?: number;
	private _runTime?: number;
	private _exception?: Error;

	pendingMessage?: string;
	pendingFixed?: boolean;
	pendingException?: Error;

	get status(): ExampleStatus {
		return this._status;
	}

	get startedAt(): number | undefined {
		return this._startedAt;
	}

	get finishedAt(): number | undefined {
		return this._finishedAt;
	}

	/** Milliseconds between start and finish, set only once finished */
	get runTime(): number | undefined {
		return this._runTime;
	}

	/** Failure recorded together with a "failed" status */
	get exception(): Error | undefined {
		return this._exception;
	}

	isFinished(): boolean {
		return this._status === "passed" || this._status === "failed" || this._status === "pending";
	}

	/**
	 * Record the start of the run
	 */
	start(startedAt: number): void {
		if (this._status !== "notStarted") {
			throw new ExampleStateError(`Cannot start an example in status "${this._status}"`);
		}
		this._status = "started";
		this._startedAt = startedAt;
	}

	/**
	 * Record the terminal status and derive the run time
	 */
	finish(status: TerminalStatus, finishedAt: number, exception?: Error): void {
		if (this._status !== "started" || this._startedAt === undefined) {
			throw new ExampleStateError(`Cannot finish an example in status "${this._status}"`);
		}
		this._status = status;
		this._finishedAt = finishedAt;
		this._runTime = finishedAt - this._startedAt;
		this._exception = exception;
	}

	toJSON(): ExecutionResultData {
		return {
			status: this._status,
			startedAt: this._startedAt,
			finishedAt: this._finishedAt,
			runTime: this._runTime,
			pendingMessage: this.pendingMessage,
			pendingFixed: this.pendingFixed,
			pendingException: this.pendingException?.message,
			exception: this._exception?.message,
		};
	}
}
