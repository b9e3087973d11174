export { evaluate, safeEvaluate, DEFAULT_NUM_SEGMENTS, DEFAULT_TIE_POLICY } from "./evaluation/evaluate";
export { fingerprintEvaluation, canonicalJson } from "./evaluation/hash";
export type { EvaluationOptions, EvaluationOutcome, EvaluationFailure } from "./evaluation/types";
export { segment } from "./segmenter/segment";
export type { BinaryLabel, Observation, Segment, TiePolicy } from "./segmenter/types";
export { aggregate, segmentOdds } from "./aggregator/aggregate";
export type { EvaluationResult, EvaluationOptionsUsed, ResultsRow, ResultsTable } from "./aggregator/types";
export {
  EvaluationError,
  InvalidInputError,
  DegenerateClassDistributionError,
  isEvaluationError
} from "./errors";
export type { EvaluationErrorKind, InputIssue } from "./errors";
export { logger } from "./logger";
export type { Logger } from "./logger";
