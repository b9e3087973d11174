export type EvaluationErrorKind = "InvalidInput" | "DegenerateClassDistribution";

export type InputIssue = {
  path: string;
  message: string;
};

export abstract class EvaluationError extends Error {
  abstract readonly kind: EvaluationErrorKind;

  constructor(
    message: string,
    public readonly issues: InputIssue[] = []
  ) {
    super(message);
  }
}

export class InvalidInputError extends EvaluationError {
  readonly kind = "InvalidInput";

  constructor(message: string, issues: InputIssue[] = []) {
    super(message, issues);
    this.name = "InvalidInputError";
  }
}

export class DegenerateClassDistributionError extends EvaluationError {
  readonly kind = "DegenerateClassDistribution";

  constructor(
    public readonly events: number,
    public readonly nonEvents: number
  ) {
    super(
      `Both classes are required to measure separation (events=${events}, nonEvents=${nonEvents}).`
    );
    this.name = "DegenerateClassDistributionError";
  }
}

export function isEvaluationError(error: unknown): error is EvaluationError {
  return error instanceof EvaluationError;
}
