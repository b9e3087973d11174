import { z } from "zod";
import { InvalidInputError } from "../errors";
import type { InputIssue } from "../errors";

export const tiePolicySchema = z.enum(["rank_equal_count", "boundary_snapping"]);

export const binaryLabelSchema = z.union([z.literal(0), z.literal(1)], {
  errorMap: () => ({ message: "Label must be 0 or 1" })
});

export const probabilitySchema = z
  .number({ invalid_type_error: "Probability must be a number" })
  .finite()
  .min(0, { message: "Probability must be within [0, 1]" })
  .max(1, { message: "Probability must be within [0, 1]" });

export const numSegmentsSchema = z
  .number({ invalid_type_error: "numSegments must be a number" })
  .int({ message: "numSegments must be an integer" })
  .min(1, { message: "numSegments must be at least 1" });

export const segmentInputSchema = z
  .object({
    probabilities: z.array(probabilitySchema).min(1, { message: "At least one observation is required" }),
    labels: z.array(binaryLabelSchema).min(1, { message: "At least one observation is required" }),
    numSegments: numSegmentsSchema,
    tiePolicy: tiePolicySchema
  })
  .superRefine((input, ctx) => {
    if (input.probabilities.length !== input.labels.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["labels"],
        message: `Expected ${input.probabilities.length} labels to match probabilities, received ${input.labels.length}`
      });
    }
  });

export type SegmentInput = z.infer<typeof segmentInputSchema>;

export function toInputIssues(error: z.ZodError): InputIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message
  }));
}

export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, context: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = toInputIssues(parsed.error);
    const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message));
    throw new InvalidInputError(`Invalid ${context}: ${summary.join("; ")}`, issues);
  }
  return parsed.data;
}
