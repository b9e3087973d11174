import { DegenerateClassDistributionError, InvalidInputError } from "../errors";
import type { InputIssue } from "../errors";
import { childLogger } from "../logger";
import type { Logger } from "../logger";
import type { Segment } from "../segmenter/types";
import type { EvaluationResult, ResultsRow } from "./types";

type Totals = { population: number; events: number; nonEvents: number };

function findSegmentIssues(segments: readonly Segment[]): InputIssue[] {
  const issues: InputIssue[] = [];
  if (segments.length === 0) {
    issues.push({ path: "", message: "At least one segment is required" });
  }
  segments.forEach((entry, index) => {
    const path = String(index);
    if (entry.segmentIndex !== index) {
      issues.push({ path: `${path}.segmentIndex`, message: `Expected segmentIndex ${index}, received ${entry.segmentIndex}` });
    }
    if (!Number.isInteger(entry.population) || entry.population < 1) {
      issues.push({ path: `${path}.population`, message: "Population must be a positive integer" });
    }
    if (!Number.isInteger(entry.events) || entry.events < 0 || !Number.isInteger(entry.nonEvents) || entry.nonEvents < 0) {
      issues.push({ path, message: "Event counts must be non-negative integers" });
    } else if (entry.events + entry.nonEvents !== entry.population) {
      issues.push({ path, message: "events + nonEvents must equal population" });
    }
  });
  return issues;
}

function sumTotals(segments: readonly Segment[]): Totals {
  return segments.reduce<Totals>(
    (totals, entry) => ({
      population: totals.population + entry.population,
      events: totals.events + entry.events,
      nonEvents: totals.nonEvents + entry.nonEvents
    }),
    { population: 0, events: 0, nonEvents: 0 }
  );
}

export function segmentOdds(events: number, nonEvents: number): number {
  if (events === 0) {
    return Number.POSITIVE_INFINITY;
  }
  return nonEvents / events;
}

type RankedRow = { row: ResultsRow; gap: number };

// Cross-multiplied counts keep separation exact, so equal separations compare equal.
function separationGap(cumEvents: number, cumNonEvents: number, totals: Totals): number {
  return Math.abs(cumEvents * totals.nonEvents - cumNonEvents * totals.events);
}

function buildRows(segments: readonly Segment[], totals: Totals): RankedRow[] {
  const running: Totals = { population: 0, events: 0, nonEvents: 0 };
  const scale = totals.events * totals.nonEvents;

  return segments.map((entry) => {
    const remainingPopulation = totals.population - running.population;
    const remainingEvents = totals.events - running.events;
    const remainingNonEvents = totals.nonEvents - running.nonEvents;

    running.population += entry.population;
    running.events += entry.events;
    running.nonEvents += entry.nonEvents;

    const gap = separationGap(running.events, running.nonEvents, totals);
    const row: ResultsRow = {
      ...entry,
      eventRate: entry.events / entry.population,
      nonEventRate: entry.nonEvents / entry.population,
      odds: segmentOdds(entry.events, entry.nonEvents),
      cumPopulation: running.population,
      cumEvents: running.events,
      cumNonEvents: running.nonEvents,
      cumPopulationPct: running.population / totals.population,
      cumEventPct: running.events / totals.events,
      cumNonEventPct: running.nonEvents / totals.nonEvents,
      remainingPopulation,
      remainingEvents,
      remainingNonEvents,
      separation: gap / scale
    };
    return { row, gap };
  });
}

// First occurrence wins on ties.
function locateMaximum(ranked: RankedRow[]): { ksStatistic: number; ksSegmentIndex: number } {
  let best = ranked[0];
  for (const entry of ranked) {
    if (entry.gap > best.gap) {
      best = entry;
    }
  }
  return { ksStatistic: best.row.separation, ksSegmentIndex: best.row.segmentIndex };
}

export function aggregate(segments: readonly Segment[], options?: { logger?: Logger }): EvaluationResult {
  const issues = findSegmentIssues(segments);
  if (issues.length > 0) {
    throw new InvalidInputError(`Invalid segments: ${issues.map((issue) => issue.message).join("; ")}`, issues);
  }

  const totals = sumTotals(segments);
  if (totals.events === 0 || totals.nonEvents === 0) {
    throw new DegenerateClassDistributionError(totals.events, totals.nonEvents);
  }

  const ranked = buildRows(segments, totals);
  const rows = ranked.map((entry) => entry.row);
  const { ksStatistic, ksSegmentIndex } = locateMaximum(ranked);

  childLogger("aggregator", options?.logger).debug(
    { segments: rows.length, ksStatistic, ksSegmentIndex },
    "Aggregated results table"
  );

  return Object.freeze({
    table: Object.freeze(rows.map((row) => Object.freeze(row))),
    ksStatistic,
    ksSegmentIndex,
    observations: totals.population,
    events: totals.events,
    nonEvents: totals.nonEvents
  });
}
