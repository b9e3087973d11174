import type { Segment, TiePolicy } from "../segmenter/types";

export type ResultsRow = Segment & {
  eventRate: number;
  nonEventRate: number;
  odds: number;
  cumPopulation: number;
  cumEvents: number;
  cumNonEvents: number;
  cumPopulationPct: number;
  cumEventPct: number;
  cumNonEventPct: number;
  remainingPopulation: number;
  remainingEvents: number;
  remainingNonEvents: number;
  separation: number;
};

export type ResultsTable = readonly Readonly<ResultsRow>[];

export type EvaluationOptionsUsed = {
  numSegments: number;
  tiePolicy: TiePolicy;
};

export type EvaluationResult = {
  readonly table: ResultsTable;
  readonly ksStatistic: number;
  readonly ksSegmentIndex: number;
  readonly observations: number;
  readonly events: number;
  readonly nonEvents: number;
  readonly options?: Readonly<EvaluationOptionsUsed>;
};
