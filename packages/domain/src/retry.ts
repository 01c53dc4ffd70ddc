/**
 * Per-request retry budget with exponential backoff.
 *
 * One budget is created per acquisition request and passed down to the
 * orchestrator; nothing about retries is kept in module state.
 */

export interface BackoffConfig {
	/** Retries allowed per provider before falling back */
	maxRetries: number;
	initialDelayMs: number;
	maxDelayMs: number;
	backoffMultiplier: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
	maxRetries: 3,
	initialDelayMs: 1000,
	maxDelayMs: 8000,
	backoffMultiplier: 2,
};

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt` (0-based).
 */
export function backoffDelay(attempt: number, config: BackoffConfig = DEFAULT_BACKOFF): number {
	return Math.min(config.initialDelayMs * config.backoffMultiplier ** attempt, config.maxDelayMs);
}

export interface RetryBudgetOptions extends Partial<BackoffConfig> {
	/** Cap on retries across every provider and sub-range of the request */
	maxTotalRetries?: number;
	sleep?: Sleeper;
}

export class RetryBudget {
	readonly config: BackoffConfig;
	readonly maxTotalRetries: number;
	private readonly sleeper: Sleeper;
	private used = 0;
	private sleptMs = 0;

	constructor(options: RetryBudgetOptions = {}) {
		const { maxTotalRetries, sleep: sleeper, ...backoff } = options;
		this.config = { ...DEFAULT_BACKOFF, ...stripUndefined(backoff) };
		this.maxTotalRetries = maxTotalRetries ?? Number.POSITIVE_INFINITY;
		this.sleeper = sleeper ?? sleep;
	}

	/**
	 * Whether a retry may follow `attempt` failed retries on one provider.
	 */
	canRetry(attempt: number): boolean {
		return attempt < this.config.maxRetries && this.used < this.maxTotalRetries;
	}

	/**
	 * Sleep before retry `attempt`, honouring a provider hint when longer.
	 *
	 * @returns the delay slept
	 */
	async wait(attempt: number, hintMs?: number): Promise<number> {
		const delay = Math.min(
			Math.max(backoffDelay(attempt, this.config), hintMs ?? 0),
			this.config.maxDelayMs,
		);
		this.used++;
		this.sleptMs += delay;
		await this.sleeper(delay);
		return delay;
	}

	get retriesUsed(): number {
		return this.used;
	}

	get totalDelayMs(): number {
		return this.sleptMs;
	}
}

function stripUndefined<T extends object>(value: T): Partial<T> {
	const result: Partial<T> = {};
	for (const key of Object.keys(value) as (keyof T)[]) {
		if (value[key] !== undefined) {
			result[key] = value[key];
		}
	}
	return result;
}
