export type BinaryLabel = 0 | 1;

export type TiePolicy = "rank_equal_count" | "boundary_snapping";

export type Observation = {
  probability: number;
  label: BinaryLabel;
  position: number;
};

export type Segment = {
  segmentIndex: number;
  lowerBound: number;
  upperBound: number;
  population: number;
  events: number;
  nonEvents: number;
};
