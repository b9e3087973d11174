import { createHash } from "node:crypto";
import type { EvaluationResult } from "../aggregator/types";

function compareKeys([left]: [string, unknown], [right]: [string, unknown]): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

// JSON has no Infinity; odds of zero-event segments are written out as strings.
function encodeValue(_key: string, value: unknown): unknown {
  if (typeof value === "number" && !Number.isFinite(value)) {
    return String(value);
  }
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value).sort(compareKeys));
  }
  return value;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, encodeValue);
}

export function fingerprintEvaluation(result: EvaluationResult): string {
  return createHash("sha256").update(canonicalJson(result)).digest("hex");
}
