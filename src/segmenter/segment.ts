import { childLogger } from "../logger";
import type { Logger } from "../logger";
import { parseOrThrow, segmentInputSchema } from "./schema";
import type { BinaryLabel, Observation, Segment, TiePolicy } from "./types";

type Span = { start: number; end: number };

function buildObservations(probabilities: readonly number[], labels: readonly BinaryLabel[]): Observation[] {
  return probabilities.map((probability, position) => ({
    probability,
    label: labels[position],
    position
  }));
}

// Descending probability; equal probabilities keep their input order.
function sortObservations(observations: Observation[]): Observation[] {
  return observations.slice().sort((a, b) => b.probability - a.probability || a.position - b.position);
}

export function equalCountCuts(size: number, groups: number): number[] {
  const base = Math.floor(size / groups);
  const remainder = size % groups;
  const cuts: number[] = [];
  let offset = 0;
  for (let index = 0; index < groups; index += 1) {
    offset += base + (index < remainder ? 1 : 0);
    cuts.push(offset);
  }
  return cuts;
}

function rankSpans(sorted: Observation[], numSegments: number): Span[] {
  const groups = Math.min(numSegments, sorted.length);
  let start = 0;
  return equalCountCuts(sorted.length, groups).map((end) => {
    const span = { start, end };
    start = end;
    return span;
  });
}

function snappedSpans(sorted: Observation[], numSegments: number): Span[] {
  const size = sorted.length;
  const groups = Math.min(numSegments, size);
  const cuts: number[] = [];
  let previous = 0;

  for (const ideal of equalCountCuts(size, groups).slice(0, -1)) {
    let cut = ideal;
    while (cut < size && sorted[cut].probability === sorted[cut - 1].probability) {
      cut += 1;
    }
    if (cut <= previous || cut >= size) {
      continue;
    }
    cuts.push(cut);
    previous = cut;
  }
  cuts.push(size);

  let start = 0;
  return cuts.map((end) => {
    const span = { start, end };
    start = end;
    return span;
  });
}

function summarizeSpan(sorted: Observation[], span: Span, segmentIndex: number): Segment {
  let events = 0;
  for (let index = span.start; index < span.end; index += 1) {
    events += sorted[index].label;
  }
  const population = span.end - span.start;
  return {
    segmentIndex,
    lowerBound: sorted[span.end - 1].probability,
    upperBound: sorted[span.start].probability,
    population,
    events,
    nonEvents: population - events
  };
}

export function segment(
  probabilities: readonly number[],
  labels: readonly number[],
  numSegments: number,
  tiePolicy: TiePolicy,
  options?: { logger?: Logger }
): Segment[] {
  const input = parseOrThrow(
    segmentInputSchema,
    { probabilities, labels, numSegments, tiePolicy },
    "segmentation input"
  );
  const log = childLogger("segmenter", options?.logger);

  const sorted = sortObservations(buildObservations(input.probabilities, input.labels));
  const spans =
    input.tiePolicy === "boundary_snapping"
      ? snappedSpans(sorted, input.numSegments)
      : rankSpans(sorted, input.numSegments);
  const segments = spans.map((span, index) => summarizeSpan(sorted, span, index));

  log.debug(
    {
      observations: sorted.length,
      requestedSegments: input.numSegments,
      segments: segments.length,
      tiePolicy: input.tiePolicy
    },
    "Segmented observations"
  );

  return segments;
}
