export {
	ScopeKind,
	type CorrelationGroup,
	type EvaluationRules,
} from "./types.js";
export { CorrelationDetector, latestPerAccount } from "./correlation-detector.js";
export {
	CorrelationPipeline,
	malformedReason,
	type CorrelationPipelineOptions,
	type PipelineStats,
	type SweepResult,
} from "./correlation-pipeline.js";
