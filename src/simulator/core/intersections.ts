// simulator/core/intersections.ts
// Static crossing topology and its per-tick view restricted to occupied roads

import type { IntersectionMap } from "@/types/road";

/**
 * Restrict the static intersection map to active roads.
 * Pure: returns a fresh map of {active road: active crossing roads}, leaving
 * out roads whose crossing set would be empty and self references.
 */
export function reduceIntersections(
  intersections: ReadonlyMap<number, ReadonlySet<number>>,
  activeRoads: ReadonlySet<number>
): IntersectionMap {
  const output: IntersectionMap = new Map();
  for (const road of activeRoads) {
    const crossing = intersections.get(road);
    if (!crossing) continue;

    const activeCrossing = new Set<number>();
    for (const other of crossing) {
      if (other !== road && activeRoads.has(other)) {
        activeCrossing.add(other);
      }
    }
    if (activeCrossing.size > 0) {
      output.set(road, activeCrossing);
    }
  }
  return output;
}

export type IntersectionInput = ReadonlyMap<number, Iterable<number>>;

/**
 * Union `additions` into `target` in place.
 * With `symmetric`, every pair is also added in the reverse direction.
 */
export function mergeIntersections(
  target: IntersectionMap,
  additions: IntersectionInput,
  symmetric: boolean = false
): IntersectionMap {
  const add = (from: number, to: number) => {
    const existing = target.get(from);
    if (existing) {
      existing.add(to);
    } else {
      target.set(from, new Set([to]));
    }
  };

  for (const [road, crossing] of additions) {
    for (const other of crossing) {
      add(road, other);
      if (symmetric) add(other, road);
    }
  }
  return target;
}

/** Road indices referenced anywhere in the input (keys and values) */
export function referencedRoads(input: IntersectionInput): number[] {
  const roads = new Set<number>();
  for (const [road, crossing] of input) {
    roads.add(road);
    for (const other of crossing) roads.add(other);
  }
  return [...roads];
}
