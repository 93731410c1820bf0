// simulator/core/Simulation.ts

import { NetworkDefinitionError } from "@/common/errors";
import { createRng, normalizeSeed, type Rng } from "@/common/random";
import { getSimulationConfig } from "@/config/simulationConfig";
import { devLog } from "@/logger";
import type { GeneratorPath, IntersectionMap, Point, RoadDefinition, SignalPhase } from "@/types/road";
import { Road } from "@/simulator/road/Road";
import { Vehicle, vehicleParamsFromConfig, type VehicleParams } from "@/simulator/road/Vehicle";
import { TrafficSignal } from "@/simulator/signal/TrafficSignal";
import { VehicleGenerator } from "@/simulator/generator/VehicleGenerator";
import type { CollisionPair, Display, SimulationConfig, SimulationSnapshot } from "@/simulator/types";
import {
  mergeIntersections,
  reduceIntersections,
  referencedRoads,
  type IntersectionInput,
} from "./intersections";
import { executeSimulationStep, isGenerationCapReached, type SimulationState } from "./simulation-step";

/** RL action: truthy requests a signal toggle */
export type SignalAction = boolean | number | null | undefined;

export interface SimulationOptions {
  /** Stop generating after this many vehicles; null/undefined = unlimited */
  generationLimit?: number | null;
  /** Overrides on top of the loaded simulation config */
  config?: Partial<SimulationConfig>;
  /** Generator RNG (default: seeded from config.seed) */
  rng?: Rng;
}

export interface InsertVehicleOptions {
  /** Position along the first road (default 0) */
  x?: number;
  /** Initial speed (default: max speed) */
  v?: number;
}

export class Simulation {
  readonly config: SimulationConfig;

  private readonly state: SimulationState;
  private readonly rng: Rng;
  private readonly vehicleParams: VehicleParams;
  private display: Display | null = null;
  private collisions: CollisionPair[] = [];
  private completionLogged = false;

  constructor(options: SimulationOptions = {}) {
    this.config = { ...getSimulationConfig(), ...options.config };
    this.rng = options.rng ?? createRng(normalizeSeed(this.config.seed));
    this.vehicleParams = vehicleParamsFromConfig(this.config);

    const generationLimit = options.generationLimit ?? null;
    if (generationLimit !== null && (!Number.isInteger(generationLimit) || generationLimit < 0)) {
      throw new NetworkDefinitionError(`Generation limit must be a non-negative integer, got ${generationLimit}`);
    }

    this.state = {
      t: 0,
      dt: this.config.dt,
      roads: [],
      generators: [],
      trafficSignals: [],
      nonEmptyRoads: new Set(),
      intersections: new Map(),
      collisionDetected: false,
      vehiclesGenerated: 0,
      vehiclesOnMap: 0,
      waitingTimes: [],
      generationLimit,
    };
  }

  // === State accessors ===

  get t(): number {
    return this.state.t;
  }

  get dt(): number {
    return this.state.dt;
  }

  get roads(): readonly Road[] {
    return this.state.roads;
  }

  get generators(): readonly VehicleGenerator[] {
    return this.state.generators;
  }

  get trafficSignals(): readonly TrafficSignal[] {
    return this.state.trafficSignals;
  }

  get collisionDetected(): boolean {
    return this.state.collisionDetected;
  }

  get vehiclesGenerated(): number {
    return this.state.vehiclesGenerated;
  }

  get vehiclesOnMap(): number {
    return this.state.vehiclesOnMap;
  }

  get generationLimit(): number | null {
    return this.state.generationLimit;
  }

  get nonEmptyRoads(): ReadonlySet<number> {
    return this.state.nonEmptyRoads;
  }

  /** Intersections restricted to non-empty roads (fresh map on every access) */
  get intersections(): IntersectionMap {
    return reduceIntersections(this.state.intersections, this.state.nonEmptyRoads);
  }

  /** Full static crossing topology */
  get staticIntersections(): ReadonlyMap<number, ReadonlySet<number>> {
    return this.state.intersections;
  }

  /** Pairs found by the most recent collision scan */
  get lastCollisions(): readonly CollisionPair[] {
    return this.collisions;
  }

  /** Journey times of every vehicle that finished its path */
  get waitingTimes(): readonly number[] {
    return this.state.waitingTimes;
  }

  get displayClosed(): boolean {
    return this.display !== null && this.display.closed;
  }

  /** Terminal: a collision, or the generation cap reached with an empty map */
  get completed(): boolean {
    const reachedLimit =
      this.state.generationLimit !== null &&
      this.state.vehiclesGenerated === this.state.generationLimit &&
      this.state.vehiclesOnMap === 0;
    return this.state.collisionDetected || reachedLimit;
  }

  getAverageWaitTime(): number {
    const times = this.state.waitingTimes;
    if (times.length === 0) return 0;
    let sum = 0;
    for (const time of times) sum += time;
    return sum / times.length;
  }

  // === Network construction ===

  addRoad(start: Point, end: Point): Road {
    const road = new Road(start, end, this.state.roads.length);
    this.state.roads.push(road);
    return road;
  }

  addRoads(roads: readonly RoadDefinition[]): Road[] {
    return roads.map(([start, end]) => this.addRoad(start, end));
  }

  /** Merge crossing pairs into the static topology */
  addIntersections(intersections: IntersectionInput, symmetric: boolean = false): void {
    for (const road of referencedRoads(intersections)) {
      this.requireRoad(road, "intersection");
    }
    mergeIntersections(this.state.intersections, intersections, symmetric);
  }

  addGenerator(vehicleRate: number, paths: readonly GeneratorPath[]): VehicleGenerator {
    if (!(vehicleRate > 0)) {
      throw new NetworkDefinitionError(`Vehicle rate must be positive, got ${vehicleRate}`);
    }
    if (paths.length === 0) {
      throw new NetworkDefinitionError("Generator needs at least one path");
    }
    if (!paths.some((path) => path.weight > 0)) {
      throw new NetworkDefinitionError("Generator needs at least one path with positive weight");
    }

    const inboundRoads = new Map<number, Road>();
    for (const path of paths) {
      this.requirePath(path.roads);
      inboundRoads.set(path.roads[0], this.state.roads[path.roads[0]]);
    }

    const generator = new VehicleGenerator({
      vehicleRate,
      paths,
      inboundRoads,
      rng: this.rng,
      params: this.vehicleParams,
    });
    this.state.generators.push(generator);
    return generator;
  }

  addTrafficSignal(
    roadGroups: readonly (readonly number[])[],
    cycle: readonly SignalPhase[],
    slowDistance: number,
    slowFactor: number,
    stopDistance: number
  ): TrafficSignal {
    const roads = roadGroups.map((group) => group.map((i) => this.requireRoad(i, "traffic signal")));
    const signal = new TrafficSignal(roads, cycle, slowDistance, slowFactor, stopDistance);
    this.state.trafficSignals.push(signal);
    return signal;
  }

  /**
   * Place a vehicle directly on the first road of `path`, counted like a
   * generated one. Returns null once the generation cap is reached.
   * Vehicles on a road must stay ordered: `x` has to be behind the road's last vehicle.
   */
  insertVehicle(path: readonly number[], options: InsertVehicleOptions = {}): Vehicle | null {
    this.requirePath(path);
    if (isGenerationCapReached(this.state)) return null;

    const road = this.state.roads[path[0]];
    const x = options.x ?? 0;
    const last = road.vehicles.last();
    if (last && x >= last.x) {
      throw new NetworkDefinitionError(
        `Vehicle at x=${x} would be ahead of the last vehicle on road ${road.index} (x=${last.x})`,
        road.index
      );
    }

    const vehicle = new Vehicle({
      id: this.state.vehiclesGenerated,
      path,
      spawnTime: this.state.t,
      params: this.vehicleParams,
      x,
      v: options.v,
    });
    road.push(vehicle);
    this.state.vehiclesGenerated += 1;
    this.state.vehiclesOnMap += 1;
    this.state.nonEmptyRoads.add(road.index);
    return vehicle;
  }

  /** Attach a display and draw the current state once */
  attachDisplay(display: Display): void {
    this.display = display;
    display.update();
  }

  // === Stepping ===

  update(): void {
    const wasCollided = this.state.collisionDetected;

    this.collisions = executeSimulationStep(this.state, {
      collisionRadius: this.config.collisionRadius,
      collisionMode: this.config.collisionMode,
    });

    if (!wasCollided && this.state.collisionDetected) {
      const pair = this.collisions[0];
      devLog.warn(
        `Collision at t=${this.state.t.toFixed(3)}: road ${pair.roadIndex} veh ${pair.vehicleId} / ` +
          `road ${pair.otherRoadIndex} veh ${pair.otherVehicleId} (${pair.distance.toFixed(2)}m)`
      );
    }

    this.state.t += this.state.dt;

    if (this.display) {
      this.display.update();
    }

    if (this.completed && !this.completionLogged) {
      this.completionLogged = true;
      devLog.info(
        `Episode complete at t=${this.state.t.toFixed(2)}: generated=${this.state.vehiclesGenerated}, ` +
          `collision=${this.state.collisionDetected}, avgWait=${this.getAverageWaitTime().toFixed(2)}s`
      );
    }
  }

  /**
   * RL transition: on a truthy action, move every signal into its next phase,
   * hold it for `actionTransitionTicks`, then advance again; finally run `n` ticks.
   * Stops early once completed or the display is closed.
   */
  run(action: SignalAction, n: number = this.config.defaultRunTicks): void {
    if (action) {
      this.updateSignals();
      this.loop(this.config.actionTransitionTicks);
      if (this.completed || this.displayClosed) return;
      this.updateSignals();
    }
    this.loop(n);
  }

  snapshot(): SimulationSnapshot {
    const vehicles: SimulationSnapshot["vehicles"] = [];
    for (const i of this.state.nonEmptyRoads) {
      for (const vehicle of this.state.roads[i].vehicles) {
        vehicles.push({
          id: vehicle.id,
          roadIndex: i,
          x: vehicle.x,
          v: vehicle.v,
          position: { x: vehicle.position.x, y: vehicle.position.y },
        });
      }
    }

    return {
      t: this.state.t,
      vehiclesGenerated: this.state.vehiclesGenerated,
      vehiclesOnMap: this.state.vehiclesOnMap,
      nonEmptyRoads: [...this.state.nonEmptyRoads],
      collisionDetected: this.state.collisionDetected,
      completed: this.completed,
      averageWaitTime: this.getAverageWaitTime(),
      signalPhases: this.state.trafficSignals.map((signal) => [...signal.currentCycle]),
      vehicles,
    };
  }

  private loop(n: number): void {
    for (let i = 0; i < n; i++) {
      this.update();
      if (this.completed || this.displayClosed) return;
    }
  }

  private updateSignals(): void {
    for (const signal of this.state.trafficSignals) {
      signal.update(this.state.t);
    }
  }

  private requireRoad(index: number, usage: string): Road {
    const road = Number.isInteger(index) ? this.state.roads[index] : undefined;
    if (!road) {
      throw new NetworkDefinitionError(`Unknown road ${index} referenced by ${usage}`, index);
    }
    return road;
  }

  private requirePath(path: readonly number[]): void {
    if (path.length === 0) {
      throw new NetworkDefinitionError("Vehicle path must contain at least one road");
    }
    for (const index of path) {
      this.requireRoad(index, "vehicle path");
    }
  }
}
