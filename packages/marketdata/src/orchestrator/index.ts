export { detectGaps, type GapDetectionInput } from "./gaps.js";
export { type MergeResult, mergeCandles, type RankedBatch } from "./merge.js";
export {
	type AcquisitionResult,
	DEFAULT_PROVIDER_TIMEOUT_MS,
	SourceOrchestrator,
	type SourceOrchestratorOptions,
	type SubRangeSummary,
} from "./orchestrator.js";
export { chunkRange, type PlannedSubRange, planRange, providersFor, type RangePlan, type TimeRange } from "./plan.js";
export { type AttemptRecord, InvalidTransitionError, SubRangeMachine, type SubRangeState } from "./state.js";
