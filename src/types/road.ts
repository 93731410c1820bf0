// types/road.ts

/** World-space point `[x, y]` */
export type Point = readonly [x: number, y: number];

/** Straight road segment, start -> end */
export type RoadDefinition = readonly [start: Point, end: Point];

/**
 * Route a generator can choose for a new vehicle.
 * - weight: relative likelihood among the generator's paths
 * - roads: road indices in travel order (first one is the inbound road)
 */
export interface GeneratorPath {
  weight: number;
  roads: readonly number[];
}

/** Static collision topology: road index -> indices of the roads it crosses */
export type IntersectionMap = Map<number, Set<number>>;

/** One signal phase, green (true) or red (false) for each road group */
export type SignalPhase = readonly boolean[];
