export type NodeRecord = {
  id: number;
  lat: number;
  lon: number;
};

export type EdgeRecord = {
  src: number;
  dst: number;
  distance: number; // unit fixed per dataset
};

export type RawGraph = {
  nodes: NodeRecord[];
  edges: EdgeRecord[];
};

export type CanonicalGraph = {
  nodes: ReadonlyMap<number, NodeRecord>; // ids contiguous 0..N-1
  edges: readonly EdgeRecord[]; // unique by (src, dst), sorted
};

export type TimeGrid = {
  arrivalPoints: number[]; // minutes from midnight, strictly increasing, starts at 0
  widthPoints: number[];
};

export type EdgeAttributes = {
  costs: number[]; // one per arrival point
  baseWidth: number;
  rushWidth: number;
  distance: number;
};

export type SynthesizedEdge = EdgeAttributes & {
  src: number;
  dst: number;
  baseCost: number;
  clearway: boolean;
  scored: boolean;
};

/** Uniform source in [0, 1) */
export type Random = {
  next: () => number;
};

/** Free-flow speed in distance units per minute */
export type SpeedModel = (random: Random) => number;
