// simulator/core/collisionCheck.ts
// Pairwise proximity check between vehicles on crossing, occupied roads

import type { CollisionMode } from "@/config/simulationConfig";
import type { IntersectionMap } from "@/types/road";
import type { Road } from "@/simulator/road/Road";
import type { CollisionPair } from "@/simulator/types";

export interface CollisionCheckContext {
  roads: readonly Road[];
  /** Active-filtered intersections (see reduceIntersections) */
  intersections: IntersectionMap;
  /** Pairs strictly closer than this collide */
  radius: number;
  /** "first" stops at the first pair; "all" collects every distinct pair */
  mode: CollisionMode;
}

/**
 * Naive O(vehicles x crossing vehicles) scan; the active road count stays small.
 * @returns detected pairs (at most one in "first" mode)
 */
export function checkCollisions(ctx: CollisionCheckContext): CollisionPair[] {
  const { roads, intersections, radius, mode } = ctx;
  const pairs: CollisionPair[] = [];
  const seen = new Set<string>();

  for (const [roadIndex, crossing] of intersections) {
    const road = roads[roadIndex];
    for (const vehicle of road.vehicles) {
      for (const otherRoadIndex of crossing) {
        for (const other of roads[otherRoadIndex].vehicles) {
          const distance = vehicle.position.distanceTo(other.position);
          if (distance >= radius) continue;

          const pair: CollisionPair = {
            roadIndex,
            vehicleId: vehicle.id,
            otherRoadIndex,
            otherVehicleId: other.id,
            distance,
          };
          if (mode === "first") {
            return [pair];
          }

          // symmetric maps visit every pair from both roads
          const key =
            roadIndex < otherRoadIndex
              ? `${roadIndex}:${vehicle.id}|${otherRoadIndex}:${other.id}`
              : `${otherRoadIndex}:${other.id}|${roadIndex}:${vehicle.id}`;
          if (!seen.has(key)) {
            seen.add(key);
            pairs.push(pair);
          }
        }
      }
    }
  }

  return pairs;
}
