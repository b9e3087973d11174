import { z } from "zod";
import { aggregate } from "../aggregator/aggregate";
import type { EvaluationResult, ResultsRow } from "../aggregator/types";
import { isEvaluationError } from "../errors";
import { childLogger } from "../logger";
import { numSegmentsSchema, parseOrThrow, tiePolicySchema } from "../segmenter/schema";
import { segment } from "../segmenter/segment";
import type { EvaluationOptions, EvaluationOutcome } from "./types";

export const DEFAULT_NUM_SEGMENTS = 10;
export const DEFAULT_TIE_POLICY = "rank_equal_count";

const evaluationOptionsSchema = z.object({
  numSegments: numSegmentsSchema.default(DEFAULT_NUM_SEGMENTS),
  tiePolicy: tiePolicySchema.default(DEFAULT_TIE_POLICY),
  boundDecimals: z
    .number()
    .int({ message: "boundDecimals must be an integer" })
    .min(0, { message: "boundDecimals must be between 0 and 15" })
    .max(15, { message: "boundDecimals must be between 0 and 15" })
    .optional()
});

function roundBound(value: number, decimals: number): number {
  return Number(value.toFixed(decimals));
}

function roundRowBounds(row: Readonly<ResultsRow>, decimals: number | undefined): Readonly<ResultsRow> {
  if (decimals === undefined) {
    return row;
  }
  return Object.freeze({
    ...row,
    lowerBound: roundBound(row.lowerBound, decimals),
    upperBound: roundBound(row.upperBound, decimals)
  });
}

export function evaluate(
  probabilities: readonly number[],
  labels: readonly number[],
  options: EvaluationOptions = {}
): EvaluationResult {
  const { numSegments, tiePolicy, boundDecimals } = parseOrThrow(
    evaluationOptionsSchema,
    {
      numSegments: options.numSegments,
      tiePolicy: options.tiePolicy,
      boundDecimals: options.boundDecimals
    },
    "evaluation options"
  );
  const segments = segment(probabilities, labels, numSegments, tiePolicy, { logger: options.logger });
  const result = aggregate(segments, { logger: options.logger });

  childLogger("evaluation", options.logger).debug(
    { observations: result.observations, events: result.events, nonEvents: result.nonEvents, ksStatistic: result.ksStatistic },
    "Evaluated classifier separation"
  );

  return Object.freeze({
    ...result,
    table: Object.freeze(result.table.map((row) => roundRowBounds(row, boundDecimals))),
    options: Object.freeze({ numSegments, tiePolicy })
  });
}

// Only evaluation errors become tagged failures.
export function safeEvaluate(
  probabilities: readonly number[],
  labels: readonly number[],
  options: EvaluationOptions = {}
): EvaluationOutcome {
  try {
    return { ok: true, result: evaluate(probabilities, labels, options) };
  } catch (error) {
    if (!isEvaluationError(error)) {
      throw error;
    }
    return {
      ok: false,
      error: { kind: error.kind, message: error.message, issues: error.issues }
    };
  }
}
