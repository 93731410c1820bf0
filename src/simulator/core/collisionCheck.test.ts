import { describe, it, expect } from "vitest";
import type { IntersectionMap } from "@/types/road";
import { Road } from "@/simulator/road/Road";
import { Vehicle, vehicleParamsFromConfig } from "@/simulator/road/Vehicle";
import { createDefaultConfig } from "@/simulator/types";
import { checkCollisions } from "./collisionCheck";

const params = vehicleParamsFromConfig(createDefaultConfig());

const vehicle = (id: number, x: number) => new Vehicle({ id, path: [0], spawnTime: 0, params, x });

const crossing: IntersectionMap = new Map([
  [0, new Set([1])],
  [1, new Set([0])],
]);

// road 0 runs north through the origin, road 1 runs east through it
const setup = () => {
  const roads = [new Road([0, -10], [0, 10], 0), new Road([-10, 0], [10, 0], 1)];
  roads[0].push(vehicle(0, 10)); // (0, 0)
  roads[1].push(vehicle(1, 10.5)); // (0.5, 0)
  roads[1].push(vehicle(2, 9)); // (-1, 0)
  return roads;
};

describe("checkCollisions", () => {
  it("stops at the first close pair", () => {
    const pairs = checkCollisions({ roads: setup(), intersections: crossing, radius: 2, mode: "first" });

    expect(pairs).toHaveLength(1);
    expect(pairs[0].roadIndex).toBe(0);
    expect(pairs[0].vehicleId).toBe(0);
    expect(pairs[0].otherRoadIndex).toBe(1);
    expect(pairs[0].otherVehicleId).toBe(1);
    expect(pairs[0].distance).toBeCloseTo(0.5, 10);
  });

  it("collects every distinct pair once in all mode", () => {
    const pairs = checkCollisions({ roads: setup(), intersections: crossing, radius: 2, mode: "all" });

    expect(pairs.map((pair) => [pair.vehicleId, pair.otherVehicleId])).toEqual([
      [0, 1],
      [0, 2],
    ]);
  });

  it("uses a strict radius", () => {
    const pairs = checkCollisions({ roads: setup(), intersections: crossing, radius: 0.5, mode: "all" });
    expect(pairs).toEqual([]);
  });

  it("only compares roads present in the intersection map", () => {
    const pairs = checkCollisions({ roads: setup(), intersections: new Map(), radius: 2, mode: "all" });
    expect(pairs).toEqual([]);
  });
});
