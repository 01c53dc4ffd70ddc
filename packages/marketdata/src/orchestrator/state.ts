/**
 * Sub-range State Machine
 *
 * requested → primary_attempted → fulfilled
 *                               → fallback_attempted → fulfilled | gap_recorded
 *
 * A failed primary with no fallback candidate moves straight to
 * gap_recorded. Each fallback provider tried re-enters fallback_attempted.
 */

import type { ProviderError } from "@fxline/domain";
import type { PlannedSubRange } from "./plan.js";

export type SubRangeState = "requested" | "primary_attempted" | "fallback_attempted" | "fulfilled" | "gap_recorded";

const TRANSITIONS: Record<SubRangeState, readonly SubRangeState[]> = {
	requested: ["primary_attempted"],
	primary_attempted: ["fulfilled", "fallback_attempted", "gap_recorded"],
	fallback_attempted: ["fallback_attempted", "fulfilled", "gap_recorded"],
	fulfilled: [],
	gap_recorded: [],
};

export interface AttemptRecord {
	provider: string;
	outcome: "candles" | "empty" | "error";
	retries: number;
	error?: ProviderError;
}

export class InvalidTransitionError extends Error {
	constructor(from: SubRangeState, to: SubRangeState) {
		super(`Invalid sub-range transition ${from} → ${to}`);
		this.name = "InvalidTransitionError";
	}
}

export class SubRangeMachine {
	private current: SubRangeState = "requested";
	private readonly history: SubRangeState[] = ["requested"];
	readonly attempts: AttemptRecord[] = [];

	constructor(readonly range: PlannedSubRange) {}

	get state(): SubRangeState {
		return this.current;
	}

	get path(): readonly SubRangeState[] {
		return this.history;
	}

	get terminal(): boolean {
		return TRANSITIONS[this.current].length === 0;
	}

	transition(to: SubRangeState): void {
		if (!TRANSITIONS[this.current].includes(to)) {
			throw new InvalidTransitionError(this.current, to);
		}
		this.current = to;
		this.history.push(to);
	}

	/**
	 * Move into the attempted state for the next provider call.
	 */
	beginAttempt(): void {
		this.transition(this.current === "requested" ? "primary_attempted" : "fallback_attempted");
	}

	record(attempt: AttemptRecord): void {
		this.attempts.push(attempt);
	}

	/**
	 * Every attempt failed with an error, none answered.
	 */
	get exhausted(): boolean {
		return this.attempts.length > 0 && this.attempts.every((a) => a.outcome === "error");
	}
}
