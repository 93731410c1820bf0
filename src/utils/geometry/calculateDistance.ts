import { Vector2 } from "three";
import type { IntersectionMap, Point, RoadDefinition } from "@/types/road";

// utils/geometry/calculateStraightDistance.ts
export function calculateStraightDistance(pointA: Point, pointB: Point): number {
  const dx = pointB[0] - pointA[0];
  const dy = pointB[1] - pointA[1];
  return Math.hypot(dx, dy);
}

// utils/geometry/calculateDirection.ts
/** Unit vector pointing from start to end (zero vector for a degenerate segment) */
export function calculateDirection(start: Point, end: Point): Vector2 {
  return new Vector2(end[0] - start[0], end[1] - start[1]).normalize();
}

// utils/geometry/segmentsCross.ts
// Signed area of the triangle (a, b, c): > 0 when c lies left of a->b
function orientation(a: Point, b: Point, c: Point): number {
  return (b[0] - a[0]) * (c[1] - a[1]) - (b[1] - a[1]) * (c[0] - a[0]);
}

/**
 * Proper crossing test: true only when each segment strictly separates the
 * other's endpoints. Segments that merely touch (a road ending where the next
 * one starts) or overlap collinearly do not cross.
 */
export function segmentsCross(first: RoadDefinition, second: RoadDefinition): boolean {
  const [a, b] = first;
  const [c, d] = second;
  const o1 = orientation(a, b, c);
  const o2 = orientation(a, b, d);
  const o3 = orientation(c, d, a);
  const o4 = orientation(c, d, b);
  return o1 * o2 < 0 && o3 * o4 < 0;
}

/** Symmetric intersection map of every crossing pair of roads (roads without crossings are omitted) */
export function findIntersectingRoads(roads: readonly RoadDefinition[]): IntersectionMap {
  const intersections: IntersectionMap = new Map();
  for (let i = 0; i < roads.length; i++) {
    for (let j = i + 1; j < roads.length; j++) {
      if (!segmentsCross(roads[i], roads[j])) continue;
      addPair(intersections, i, j);
      addPair(intersections, j, i);
    }
  }
  return intersections;
}

function addPair(intersections: IntersectionMap, from: number, to: number): void {
  const existing = intersections.get(from);
  if (existing) {
    existing.add(to);
  } else {
    intersections.set(from, new Set([to]));
  }
}
