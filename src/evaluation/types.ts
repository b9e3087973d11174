import type { EvaluationResult } from "../aggregator/types";
import type { EvaluationErrorKind, InputIssue } from "../errors";
import type { Logger } from "../logger";
import type { TiePolicy } from "../segmenter/types";

export type EvaluationOptions = {
  numSegments?: number;
  tiePolicy?: TiePolicy;
  boundDecimals?: number;
  logger?: Logger;
};

export type EvaluationFailure = {
  kind: EvaluationErrorKind;
  message: string;
  issues: InputIssue[];
};

export type EvaluationOutcome =
  | { ok: true; result: EvaluationResult }
  | { ok: false; error: EvaluationFailure };
