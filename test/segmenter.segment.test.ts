import { expect, test } from "vitest";
import { InvalidInputError } from "../src/errors";
import { equalCountCuts, segment } from "../src/segmenter/segment";

function captureInvalidInput(run: () => unknown): InvalidInputError {
  try {
    run();
  } catch (error) {
    if (error instanceof InvalidInputError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected InvalidInputError");
}

test("equal-count cuts give the remainder to the earliest groups", () => {
  expect(equalCountCuts(10, 3)).toEqual([4, 7, 10]);
  expect(equalCountCuts(5, 2)).toEqual([3, 5]);
  expect(equalCountCuts(4, 4)).toEqual([1, 2, 3, 4]);
});

test("segments are ordered by descending probability with counts per segment", () => {
  const segments = segment([0.1, 0.9, 0.5, 0.7, 0.3], [0, 1, 1, 0, 0], 2, "rank_equal_count");

  expect(segments).toEqual([
    { segmentIndex: 0, lowerBound: 0.5, upperBound: 0.9, population: 3, events: 2, nonEvents: 1 },
    { segmentIndex: 1, lowerBound: 0.1, upperBound: 0.3, population: 2, events: 0, nonEvents: 2 }
  ]);
});

test("rank policy splits tied probabilities in input order", () => {
  const segments = segment([0.5, 0.5, 0.5, 0.5], [1, 0, 0, 1], 2, "rank_equal_count");

  expect(segments.map((entry) => [entry.population, entry.events, entry.nonEvents])).toEqual([
    [2, 1, 1],
    [2, 1, 1]
  ]);
});

test("rank policy never produces empty segments when fewer observations than segments", () => {
  const segments = segment([0.2, 0.6, 0.4], [0, 1, 1], 10, "rank_equal_count");

  expect(segments).toHaveLength(3);
  expect(segments.map((entry) => entry.population)).toEqual([1, 1, 1]);
  expect(segments.map((entry) => entry.upperBound)).toEqual([0.6, 0.4, 0.2]);
});

test("rank policy keeps equal populations across a tied boundary", () => {
  const probabilities = [0.9, 0.8, 0.8, 0.8, 0.2, 0.1];
  const labels = [1, 1, 0, 1, 0, 0];

  const segments = segment(probabilities, labels, 3, "rank_equal_count");

  expect(segments.map((entry) => [entry.population, entry.events])).toEqual([
    [2, 2],
    [2, 1],
    [2, 0]
  ]);
  expect(segments[1]).toMatchObject({ lowerBound: 0.8, upperBound: 0.8 });
});

test("boundary snapping keeps tied probabilities in one segment", () => {
  const probabilities = [0.9, 0.8, 0.8, 0.8, 0.2, 0.1];
  const labels = [1, 1, 0, 1, 0, 0];

  const segments = segment(probabilities, labels, 3, "boundary_snapping");

  expect(segments).toEqual([
    { segmentIndex: 0, lowerBound: 0.8, upperBound: 0.9, population: 4, events: 3, nonEvents: 1 },
    { segmentIndex: 1, lowerBound: 0.1, upperBound: 0.2, population: 2, events: 0, nonEvents: 2 }
  ]);
});

test("boundary snapping collapses a single distinct value into one segment", () => {
  const segments = segment([0.4, 0.4, 0.4], [1, 0, 1], 3, "boundary_snapping");

  expect(segments).toEqual([
    { segmentIndex: 0, lowerBound: 0.4, upperBound: 0.4, population: 3, events: 2, nonEvents: 1 }
  ]);
});

test("single-class input is not a segmentation error", () => {
  const segments = segment([0.3, 0.2], [0, 0], 2, "rank_equal_count");
  expect(segments.map((entry) => entry.events)).toEqual([0, 0]);
});

test("rejects mismatched lengths", () => {
  const error = captureInvalidInput(() => segment([0.1, 0.2, 0.3], [0, 1], 2, "rank_equal_count"));
  expect(error.kind).toBe("InvalidInput");
  expect(error.issues).toEqual([
    { path: "labels", message: "Expected 3 labels to match probabilities, received 2" }
  ]);
});

test("rejects non-binary labels", () => {
  const error = captureInvalidInput(() => segment([0.1, 0.2], [1, 2], 2, "rank_equal_count"));
  expect(error.issues).toContainEqual({ path: "labels.1", message: "Label must be 0 or 1" });
});

test("rejects probabilities outside [0, 1]", () => {
  const error = captureInvalidInput(() => segment([1.5, 0.2], [1, 0], 2, "rank_equal_count"));
  expect(error.issues).toContainEqual({ path: "probabilities.0", message: "Probability must be within [0, 1]" });
});

test("rejects NaN probabilities", () => {
  const error = captureInvalidInput(() => segment([Number.NaN, 0.2], [1, 0], 2, "rank_equal_count"));
  expect(error.issues.map((issue) => issue.path)).toContain("probabilities.0");
});

test("rejects empty input", () => {
  const error = captureInvalidInput(() => segment([], [], 2, "rank_equal_count"));
  expect(error.issues).toEqual([
    { path: "probabilities", message: "At least one observation is required" },
    { path: "labels", message: "At least one observation is required" }
  ]);
});

test("rejects segment counts below one or fractional", () => {
  const zero = captureInvalidInput(() => segment([0.1, 0.9], [0, 1], 0, "rank_equal_count"));
  expect(zero.issues).toEqual([{ path: "numSegments", message: "numSegments must be at least 1" }]);

  const fractional = captureInvalidInput(() => segment([0.1, 0.9], [0, 1], 2.5, "rank_equal_count"));
  expect(fractional.issues).toEqual([{ path: "numSegments", message: "numSegments must be an integer" }]);
});
