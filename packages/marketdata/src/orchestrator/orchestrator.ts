/**
 * Source Orchestrator
 *
 * Builds one gap-aware CandleSeries per (instrument, granularity, range)
 * from the configured providers:
 *
 * 1. Plan: split the range by provider retention window
 * 2. Execute: run each sub-range through its state machine, retrying
 *    throttled or unavailable providers against the request's RetryBudget
 *    and falling back in priority order
 * 3. Merge: reduce by timestamp, higher priority wins
 * 4. Gaps: expected periods left without a candle
 *
 * Provider failures end up as fallbacks or gaps. Only an authentication
 * failure, or a request where every provider failed for every sub-range,
 * is raised.
 */

import {
	AllProvidersFailedError,
	AuthenticationError,
	type Candle,
	type CandleSeries,
	type Clock,
	errorMessage,
	expectedPeriods,
	isProviderError,
	type ProviderError,
	RateLimitedError,
	RetryBudget,
	type SessionCalendar,
	systemClock,
	UnavailableError,
} from "@fxline/domain";
import type { Logger } from "@fxline/logger";
import { log as defaultLog } from "../logger.js";
import type { CandleProvider, CandleRequest, NormalizeResult } from "../providers/types.js";
import { detectGaps } from "./gaps.js";
import { mergeCandles, type RankedBatch } from "./merge.js";
import { planRange, providersFor, type TimeRange } from "./plan.js";
import { type AttemptRecord, SubRangeMachine, type SubRangeState } from "./state.js";

// ============================================
// Types
// ============================================

export interface SourceOrchestratorOptions {
	/** Highest priority first */
	providers: readonly CandleProvider[];
	calendar?: SessionCalendar;
	clock?: Clock;
	/** Bound on each provider call */
	timeoutMs?: number;
	logger?: Logger;
}

export interface SubRangeSummary {
	start: number;
	end: number;
	state: SubRangeState;
	path: readonly SubRangeState[];
	attempts: Omit<AttemptRecord, "error">[];
}

export interface AcquisitionResult {
	series: CandleSeries;
	subRanges: SubRangeSummary[];
	failures: ProviderError[];
	retriesUsed: number;
}

type AttemptOutcome =
	| { ok: true; result: NormalizeResult<Candle>; retries: number }
	| { ok: false; error: ProviderError; retries: number };

export const DEFAULT_PROVIDER_TIMEOUT_MS = 20000;

// ============================================
// Orchestrator
// ============================================

export class SourceOrchestrator {
	private readonly providers: readonly CandleProvider[];
	private readonly calendar: SessionCalendar;
	private readonly clock: Clock;
	private readonly timeoutMs: number;
	private readonly log: Logger;

	constructor(options: SourceOrchestratorOptions) {
		this.providers = options.providers;
		this.calendar = options.calendar ?? "fx";
		this.clock = options.clock ?? systemClock;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
		this.log = options.logger ?? defaultLog;
	}

	/**
	 * Acquire `[request.start, request.end)`.
	 *
	 * @throws AuthenticationError as soon as any provider rejects its credentials
	 * @throws AllProvidersFailedError when no candle could be retrieved because every attempt failed
	 */
	async acquire(request: CandleRequest, budget: RetryBudget = new RetryBudget()): Promise<AcquisitionResult> {
		if (request.start > request.end) {
			throw new RangeError(`start ${request.start} is after end ${request.end}`);
		}

		const now = this.clock();
		const plan = planRange(request, this.providers, () => now, this.calendar);
		const exhausted: TimeRange[] = plan.unserviceable ? [plan.unserviceable] : [];
		const batches: RankedBatch[] = [];
		const failures: ProviderError[] = [];
		const machines: SubRangeMachine[] = [];
		let malformedCount = 0;

		this.log.info(
			{
				instrument: request.instrument,
				granularity: request.granularity,
				start: new Date(request.start).toISOString(),
				end: new Date(request.end).toISOString(),
				subRanges: plan.subRanges.length,
				unserviceable: plan.unserviceable !== null,
			},
			"Acquiring candles",
		);

		for (const subRange of plan.subRanges) {
			const machine = new SubRangeMachine(subRange);
			machines.push(machine);

			const fallbacks = providersFor(subRange, request, this.providers, now).filter((i) => i !== subRange.primary);
			const subRequest: CandleRequest = { ...request, start: subRange.start, end: subRange.end, asOf: now };

			for (const index of [subRange.primary, ...fallbacks]) {
				const provider = this.providers[index];
				if (!provider) {
					continue;
				}
				machine.beginAttempt();
				const outcome = await this.attempt(provider, subRequest, budget);

				if (!outcome.ok) {
					machine.record({ provider: provider.id, outcome: "error", retries: outcome.retries, error: outcome.error });
					failures.push(outcome.error);
					if (outcome.error instanceof AuthenticationError) {
						this.log.error({ provider: provider.id, error: outcome.error.message }, "Provider rejected credentials");
						throw outcome.error;
					}
					this.log.warn(
						{ provider: provider.id, code: outcome.error.code, error: outcome.error.message, ...rangeFields(subRange) },
						"Provider attempt failed, falling back",
					);
					continue;
				}

				malformedCount += outcome.result.malformed;
				const candles = outcome.result.records.filter(
					(c) => c.timestamp >= request.start && c.timestamp < request.end,
				);
				batches.push({ rank: index, candles });

				const covered = candles.some((c) => c.timestamp >= subRange.start && c.timestamp < subRange.end);
				machine.record({ provider: provider.id, outcome: covered ? "candles" : "empty", retries: outcome.retries });
				if (covered) {
					machine.transition("fulfilled");
					break;
				}
				this.log.warn({ provider: provider.id, ...rangeFields(subRange) }, "Provider returned no candles");
			}

			if (!machine.terminal) {
				machine.transition("gap_recorded");
				if (machine.exhausted) {
					exhausted.push(subRange);
				}
			}
		}

		const merged = mergeCandles(batches);
		if (merged.discrepancies.length > 0) {
			const largest = Math.max(...merged.discrepancies.map((d) => d.maxAbsDiff));
			this.log.warn(
				{ instrument: request.instrument, count: merged.discrepancies.length, largest },
				"Providers disagree on overlapping candles",
			);
		}

		const expected = expectedPeriods(request.start, request.end, request.granularity, this.calendar).length;
		if (merged.candles.length === 0 && expected > 0 && machines.every((m) => m.exhausted)) {
			throw new AllProvidersFailedError(
				`No provider could serve ${request.instrument} ${request.granularity}: ${failures.map((f) => f.message).join("; ") || "no provider supports the range"}`,
				failures,
			);
		}

		const gaps = detectGaps({
			start: request.start,
			end: request.end,
			granularity: request.granularity,
			calendar: this.calendar,
			candles: merged.candles,
			exhausted,
		});

		this.log.info(
			{
				instrument: request.instrument,
				granularity: request.granularity,
				candles: merged.candles.length,
				gaps: gaps.length,
				malformed: malformedCount,
				sources: merged.sources,
				retries: budget.retriesUsed,
			},
			"Candle acquisition complete",
		);

		return {
			series: {
				instrument: request.instrument,
				granularity: request.granularity,
				start: request.start,
				end: request.end,
				candles: merged.candles,
				gaps,
				sources: merged.sources,
				malformedCount,
				discrepancies: merged.discrepancies,
			},
			subRanges: machines.map((m) => ({
				start: m.range.start,
				end: m.range.end,
				state: m.state,
				path: m.path,
				attempts: m.attempts.map(({ provider, outcome, retries }) => ({ provider, outcome, retries })),
			})),
			failures,
			retriesUsed: budget.retriesUsed,
		};
	}

	/**
	 * Call one provider, retrying throttling and outages while the budget allows.
	 */
	private async attempt(
		provider: CandleProvider,
		request: CandleRequest,
		budget: RetryBudget,
	): Promise<AttemptOutcome> {
		let retries = 0;
		for (;;) {
			try {
				const raw = await this.callWithTimeout(provider, request);
				return { ok: true, result: provider.normalize(raw, request), retries };
			} catch (error) {
				const providerError = toProviderError(provider.id, error);
				if (!providerError.retryable || !budget.canRetry(retries)) {
					return { ok: false, error: providerError, retries };
				}
				const hint = providerError instanceof RateLimitedError ? providerError.retryAfterMs : undefined;
				const delayMs = await budget.wait(retries, hint);
				retries++;
				this.log.warn(
					{ provider: provider.id, code: providerError.code, attempt: retries, delayMs },
					"Retrying provider after backoff",
				);
			}
		}
	}

	private async callWithTimeout(provider: CandleProvider, request: CandleRequest): Promise<unknown> {
		const controller = new AbortController();
		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(() => {
				controller.abort();
				reject(new UnavailableError(provider.id, `Timed out after ${this.timeoutMs}ms`));
			}, this.timeoutMs);
		});

		try {
			return await Promise.race([provider.fetch(request, controller.signal), timeout]);
		} finally {
			clearTimeout(timer);
		}
	}
}

function toProviderError(provider: string, error: unknown): ProviderError {
	if (isProviderError(error)) {
		return error;
	}
	return new UnavailableError(provider, errorMessage(error), { cause: error });
}

function rangeFields(range: TimeRange): { from: string; to: string } {
	return { from: new Date(range.start).toISOString(), to: new Date(range.end).toISOString() };
}
