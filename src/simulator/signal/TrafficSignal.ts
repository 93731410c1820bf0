// simulator/signal/TrafficSignal.ts
// Fixed phase cycle over groups of roads; advances only when update() is called

import { NetworkDefinitionError } from "@/common/errors";
import type { SignalPhase } from "@/types/road";
import type { Road, RoadSignal } from "@/simulator/road/Road";

export class TrafficSignal implements RoadSignal {
  readonly roads: readonly (readonly Road[])[];
  readonly cycle: readonly SignalPhase[];
  readonly slowDistance: number;
  readonly slowFactor: number;
  readonly stopDistance: number;

  currentCycleIndex = 0;
  /** Simulation time of the last phase change (baseline policies also stamp it) */
  prevUpdateTime = 0;

  constructor(
    roads: readonly (readonly Road[])[],
    cycle: readonly SignalPhase[],
    slowDistance: number,
    slowFactor: number,
    stopDistance: number
  ) {
    if (cycle.length === 0) {
      throw new NetworkDefinitionError("Traffic signal cycle must have at least one phase");
    }
    for (const phase of cycle) {
      if (phase.length !== roads.length) {
        throw new NetworkDefinitionError(
          `Traffic signal phase has ${phase.length} entries for ${roads.length} road groups`
        );
      }
    }

    this.roads = roads;
    this.cycle = cycle;
    this.slowDistance = slowDistance;
    this.slowFactor = slowFactor;
    this.stopDistance = stopDistance;

    roads.forEach((group, groupIndex) => {
      for (const road of group) {
        road.setTrafficSignal(this, groupIndex);
      }
    });
  }

  get currentCycle(): SignalPhase {
    return this.cycle[this.currentCycleIndex];
  }

  isGreen(group: number): boolean {
    return this.currentCycle[group] ?? false;
  }

  /** Advance to the next phase (wrapping) and record `t` as the update time */
  update(t: number): void {
    this.currentCycleIndex = (this.currentCycleIndex + 1) % this.cycle.length;
    this.prevUpdateTime = t;
  }
}
