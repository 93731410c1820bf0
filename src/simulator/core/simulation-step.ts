// simulator/core/simulation-step.ts
// One tick of the simulation, minus the clock advance and display notification

import { devLog } from "@/logger";
import type { CollisionMode } from "@/config/simulationConfig";
import type { IntersectionMap } from "@/types/road";
import type { Road } from "@/simulator/road/Road";
import type { TrafficSignal } from "@/simulator/signal/TrafficSignal";
import type { VehicleGenerator } from "@/simulator/generator/VehicleGenerator";
import type { CollisionPair } from "@/simulator/types";
import { checkCollisions } from "./collisionCheck";
import { reduceIntersections } from "./intersections";

/**
 * Whole mutable state of one simulation run.
 * Owned by a Simulation and passed explicitly to every step function.
 */
export interface SimulationState {
  t: number;
  readonly dt: number;
  readonly roads: Road[];
  readonly generators: VehicleGenerator[];
  readonly trafficSignals: TrafficSignal[];
  /** Roads holding at least one vehicle; the only roads a tick visits */
  nonEmptyRoads: Set<number>;
  /** Static crossing topology */
  readonly intersections: IntersectionMap;
  /** Sticky: once set, the run is terminal */
  collisionDetected: boolean;
  vehiclesGenerated: number;
  vehiclesOnMap: number;
  /** Journey times of vehicles that reached the end of their path */
  readonly waitingTimes: number[];
  /** null = unlimited */
  readonly generationLimit: number | null;
}

export interface SimulationStepContext {
  collisionRadius: number;
  collisionMode: CollisionMode;
}

export interface TransferResult {
  handedOff: number;
  exited: number;
}

export function isGenerationCapReached(state: SimulationState): boolean {
  return state.generationLimit !== null && state.vehiclesGenerated >= state.generationLimit;
}

/** 1. Motion on every active road */
export function advanceRoads(state: SimulationState): void {
  for (const i of state.nonEmptyRoads) {
    state.roads[i].update(state.dt, state.t);
  }
}

/** 2. Generation, in registration order, until the cap is hit */
export function generateVehicles(state: SimulationState): void {
  for (const generator of state.generators) {
    if (isGenerationCapReached(state)) break;

    const roadIndex = generator.update(state.t, state.vehiclesGenerated);
    if (roadIndex !== null) {
      state.vehiclesGenerated += 1;
      state.vehiclesOnMap += 1;
      state.nonEmptyRoads.add(roadIndex);
    }
  }
}

/**
 * 3. Lead vehicles past their road end move to the next road of their path,
 * or leave the map and log their journey time. Re-establishes nonEmptyRoads.
 */
export function transferLeadVehicles(state: SimulationState): TransferResult {
  const newNonEmptyRoads = new Set<number>();
  const emptyRoads = new Set<number>();
  const result: TransferResult = { handedOff: 0, exited: 0 };

  for (const i of state.nonEmptyRoads) {
    const road = state.roads[i];
    const lead = road.vehicles.peek();
    if (!lead || lead.x < road.length) continue;

    if (lead.hasNextRoad()) {
      const moved = lead.handOff();
      const nextRoadIndex = moved.currentRoadIndex;
      state.roads[nextRoadIndex].push(moved);
      newNonEmptyRoads.add(nextRoadIndex);
      road.vehicles.shift();
      result.handedOff += 1;
    } else {
      road.vehicles.shift();
      state.vehiclesOnMap -= 1;
      const waitTime = lead.getTotalWaitingTime(state.t);
      state.waitingTimes.push(waitTime);
      result.exited += 1;
      devLog.veh(lead.id).debug(`exited road ${i} after ${waitTime.toFixed(2)}s`);
    }

    if (road.vehicles.isEmpty()) {
      emptyRoads.add(road.index);
    }
  }

  for (const i of emptyRoads) state.nonEmptyRoads.delete(i);
  for (const i of newNonEmptyRoads) state.nonEmptyRoads.add(i);
  return result;
}

/** 4. Collision scan over the occupied, crossing roads */
export function detectCollisions(state: SimulationState, ctx: SimulationStepContext): CollisionPair[] {
  const pairs = checkCollisions({
    roads: state.roads,
    intersections: reduceIntersections(state.intersections, state.nonEmptyRoads),
    radius: ctx.collisionRadius,
    mode: ctx.collisionMode,
  });
  if (pairs.length > 0) {
    state.collisionDetected = true;
  }
  return pairs;
}

/**
 * Run steps 1-4 in their required order:
 * motion -> generation -> hand-off/removal -> collision detection.
 */
export function executeSimulationStep(
  state: SimulationState,
  ctx: SimulationStepContext
): CollisionPair[] {
  advanceRoads(state);
  generateVehicles(state);
  transferLeadVehicles(state);
  return detectCollisions(state, ctx);
}
