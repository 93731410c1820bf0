import { describe, it, expect, vi } from "vitest";
import { NetworkDefinitionError } from "@/common/errors";
import { TWO_WAY_CYCLE, buildTwoWayIntersection } from "@/network/twoWayIntersection";
import { createRng } from "@/common/random";
import { createDefaultConfig, type Display } from "@/simulator/types";
import { Simulation } from "./Simulation";

const config = createDefaultConfig();
const dt = config.dt;

const crossingRoads = () => {
  const sim = new Simulation({ config });
  // road 0 runs north through the origin, road 1 runs east through it
  sim.addRoad([0, -10], [0, 10]);
  sim.addRoad([-10, 0], [10, 0]);
  sim.addIntersections(new Map([[0, [1]]]), true);
  return sim;
};

class CountingDisplay implements Display {
  updates = 0;
  private readonly closeAfter: number;

  constructor(closeAfter: number) {
    this.closeAfter = closeAfter;
  }

  update(): void {
    this.updates += 1;
  }

  get closed(): boolean {
    return this.updates >= this.closeAfter;
  }
}

describe("Simulation scenarios", () => {
  it("A: vehicles on separate roads never collide", () => {
    const sim = new Simulation({ config });
    sim.addRoad([0, 0], [100, 0]);
    sim.addRoad([0, 10], [100, 10]);
    sim.insertVehicle([0]);
    sim.insertVehicle([1]);

    sim.run(false, 50);

    expect(sim.collisionDetected).toBe(false);
    expect(sim.completed).toBe(false);
    expect(sim.t).toBeCloseTo(50 * dt, 10);
  });

  it("B: vehicles within the radius on crossing roads end the episode", () => {
    const sim = crossingRoads();
    sim.insertVehicle([0], { x: 10, v: 0 }); // (0, 0)
    sim.insertVehicle([1], { x: 9, v: 0 }); // (-1, 0)

    sim.update();

    expect(sim.collisionDetected).toBe(true);
    expect(sim.completed).toBe(true);
    expect(sim.t).toBeCloseTo(dt, 10);
    expect(sim.lastCollisions).toHaveLength(1);
    expect(sim.lastCollisions[0].distance).toBeCloseTo(1, 10);
  });

  it("C: a single vehicle's journey time becomes the average wait", () => {
    const sim = new Simulation({ config, generationLimit: 1 });
    sim.addRoad([0, 0], [20, 0]);
    sim.addGenerator(60, [{ weight: 1, roads: [0] }]);

    let spawnedAt: number | null = null;
    let exitedAt: number | null = null;
    for (let i = 0; i < 1000 && !sim.completed; i++) {
      const before = sim.t;
      const generated = sim.vehiclesGenerated;
      const onMap = sim.vehiclesOnMap;
      sim.update();
      if (generated === 0 && sim.vehiclesGenerated === 1) spawnedAt = before;
      if (onMap === 1 && sim.vehiclesOnMap === 0) exitedAt = before;
    }

    expect(sim.completed).toBe(true);
    expect(sim.collisionDetected).toBe(false);
    expect(spawnedAt).not.toBeNull();
    expect(exitedAt).not.toBeNull();
    expect(sim.waitingTimes).toHaveLength(1);
    expect(sim.getAverageWaitTime()).toBeCloseTo((exitedAt ?? 0) - (spawnedAt ?? 0), 10);
  });

  it("D: two actions toggle the green direction twice", () => {
    const sim = new Simulation({ config: { ...config, actionTransitionTicks: 200 } });
    sim.addRoad([0, 0], [100, 0]);
    sim.addRoad([0, 0], [0, 100]);
    const signal = sim.addTrafficSignal([[0], [1]], TWO_WAY_CYCLE, 50, 0.4, 15);
    const update = vi.spyOn(signal, "update");

    expect(signal.isGreen(1)).toBe(true);

    sim.run(true, 200);
    expect(signal.isGreen(0)).toBe(true);
    expect(signal.isGreen(1)).toBe(false);

    sim.run(true, 50);
    expect(signal.isGreen(0)).toBe(false);
    expect(signal.isGreen(1)).toBe(true);

    const times = update.mock.calls.map(([t]) => t);
    expect(times).toHaveLength(4);
    [0, 200, 400, 600].forEach((ticks, i) => {
      expect(times[i]).toBeCloseTo(ticks * dt, 6);
    });
    expect(signal.prevUpdateTime).toBeCloseTo(600 * dt, 6);
    expect(sim.t).toBeCloseTo(650 * dt, 6);
  });
});

describe("Simulation", () => {
  it("averages to zero before any vehicle finishes", () => {
    expect(new Simulation({ config }).getAverageWaitTime()).toBe(0);
  });

  it("hands a lead vehicle off to the next road of its path", () => {
    const sim = new Simulation({ config });
    sim.addRoad([0, 0], [10, 0]);
    sim.addRoad([10, 0], [20, 0]);
    sim.insertVehicle([0, 1], { x: 9.9 });

    sim.update();

    expect(sim.roads[0].vehicles.isEmpty()).toBe(true);
    const moved = sim.roads[1].vehicles.peek();
    expect(moved?.x).toBe(0);
    expect(moved?.currentRoadIndex).toBe(1);
    expect(moved?.position.x).toBe(10);
    expect([...sim.nonEmptyRoads]).toEqual([1]);
    expect(sim.vehiclesOnMap).toBe(1);
    expect(sim.waitingTimes).toEqual([]);
  });

  it("removes a vehicle at the end of its path and logs its journey", () => {
    const sim = new Simulation({ config });
    sim.addRoad([0, 0], [10, 0]);
    sim.insertVehicle([0], { x: 9.9 });

    sim.update();

    expect(sim.vehiclesOnMap).toBe(0);
    expect(sim.nonEmptyRoads.size).toBe(0);
    expect(sim.waitingTimes).toEqual([0]);
    expect(sim.completed).toBe(false);
  });

  it("keeps the collision flag once set", () => {
    const sim = crossingRoads();
    sim.insertVehicle([0], { x: 10, v: 0 });
    sim.insertVehicle([1], { x: 9, v: 0 });
    sim.update();

    const east = sim.roads[1].vehicles.peek();
    if (east) east.x = 1;
    sim.update();

    expect(sim.lastCollisions).toEqual([]);
    expect(sim.collisionDetected).toBe(true);
    expect(sim.completed).toBe(true);
  });

  it("restricts intersections to occupied roads", () => {
    const sim = crossingRoads();
    sim.insertVehicle([0]);
    expect(sim.intersections.size).toBe(0);

    sim.insertVehicle([1]);
    expect(sim.intersections).toEqual(
      new Map([
        [0, new Set([1])],
        [1, new Set([0])],
      ])
    );
    expect(sim.staticIntersections.get(0)).toEqual(new Set([1]));
  });

  it("keeps nonEmptyRoads equal to the roads holding vehicles", () => {
    const { sim } = buildTwoWayIntersection({
      vehicleRate: 60,
      generationLimit: null,
      config,
      rng: createRng(7),
    });

    for (let i = 0; i < 1200; i++) {
      sim.update();
      const occupied = sim.roads.filter((road) => !road.vehicles.isEmpty()).map((road) => road.index);
      expect([...sim.nonEmptyRoads].sort((a, b) => a - b)).toEqual(occupied);
      expect(sim.roads.reduce((total, road) => total + road.vehicles.size, 0)).toBe(sim.vehiclesOnMap);
    }
    expect(sim.vehiclesGenerated).toBeGreaterThan(0);
  });

  it("never generates past the cap", () => {
    const sim = new Simulation({ config, generationLimit: 3 });
    sim.addRoad([0, 0], [100, 0]);
    sim.addGenerator(600, [{ weight: 1, roads: [0] }]);

    for (let i = 0; i < 3000 && !sim.completed; i++) {
      sim.update();
      expect(sim.vehiclesGenerated).toBeLessThanOrEqual(3);
    }

    expect(sim.vehiclesGenerated).toBe(3);
    expect(sim.completed).toBe(true);
    expect(sim.insertVehicle([0])).toBeNull();
  });

  it("is complete from the start with a zero cap", () => {
    const sim = new Simulation({ config, generationLimit: 0 });
    sim.addRoad([0, 0], [100, 0]);

    expect(sim.completed).toBe(true);
    expect(sim.insertVehicle([0])).toBeNull();
  });

  it("stops running once the display closes", () => {
    const sim = new Simulation({ config });
    sim.addRoad([0, 0], [100, 0]);
    const display = new CountingDisplay(3);
    sim.attachDisplay(display);

    sim.run(false, 100);

    expect(display.updates).toBe(3);
    expect(sim.displayClosed).toBe(true);
    expect(sim.t).toBeCloseTo(2 * dt, 10);
  });

  it("leaves signals alone on a falsy action", () => {
    const sim = new Simulation({ config });
    sim.addRoad([0, 0], [100, 0]);
    sim.addRoad([0, 0], [0, 100]);
    const signal = sim.addTrafficSignal([[0], [1]], TWO_WAY_CYCLE, 50, 0.4, 15);
    const update = vi.spyOn(signal, "update");

    sim.run(0, 10);

    expect(update).not.toHaveBeenCalled();
    expect(signal.currentCycleIndex).toBe(0);
  });

  it("snapshots vehicles and signal phases", () => {
    const sim = new Simulation({ config });
    sim.addRoad([0, 0], [100, 0]);
    sim.addRoad([0, 0], [0, 100]);
    sim.addTrafficSignal([[0], [1]], TWO_WAY_CYCLE, 50, 0.4, 15);
    sim.insertVehicle([1], { x: 5, v: 3 });

    const snapshot = sim.snapshot();

    expect(snapshot.vehiclesGenerated).toBe(1);
    expect(snapshot.nonEmptyRoads).toEqual([1]);
    expect(snapshot.signalPhases).toEqual([[false, true]]);
    expect(snapshot.vehicles).toEqual([{ id: 0, roadIndex: 1, x: 5, v: 3, position: { x: 0, y: 5 } }]);
  });

  describe("network validation", () => {
    it("rejects unknown roads in intersections", () => {
      const sim = crossingRoads();
      expect(() => sim.addIntersections(new Map([[0, [5]]]))).toThrow(NetworkDefinitionError);
    });

    it("rejects bad generators", () => {
      const sim = crossingRoads();
      expect(() => sim.addGenerator(0, [{ weight: 1, roads: [0] }])).toThrow(NetworkDefinitionError);
      expect(() => sim.addGenerator(10, [])).toThrow(NetworkDefinitionError);
      expect(() => sim.addGenerator(10, [{ weight: 0, roads: [0] }])).toThrow(NetworkDefinitionError);
      expect(() => sim.addGenerator(10, [{ weight: 1, roads: [0, 9] }])).toThrow(NetworkDefinitionError);
    });

    it("rejects a negative or fractional cap", () => {
      expect(() => new Simulation({ generationLimit: -1 })).toThrow(NetworkDefinitionError);
      expect(() => new Simulation({ generationLimit: 1.5 })).toThrow(NetworkDefinitionError);
    });

    it("rejects vehicles placed ahead of the road's last vehicle", () => {
      const sim = crossingRoads();
      sim.insertVehicle([0], { x: 5 });
      expect(() => sim.insertVehicle([0], { x: 6 })).toThrow(NetworkDefinitionError);
      expect(sim.insertVehicle([0], { x: 1 })?.id).toBe(1);
    });

    it("reports the offending road index", () => {
      const sim = crossingRoads();
      try {
        sim.insertVehicle([4]);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(NetworkDefinitionError);
        if (error instanceof NetworkDefinitionError) {
          expect(error.roadIndex).toBe(4);
        }
      }
    });
  });
});
