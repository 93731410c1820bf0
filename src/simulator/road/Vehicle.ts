// simulator/road/Vehicle.ts
// IDM (Intelligent Driver Model) car-following vehicle

import { Vector2 } from "three";
import type { SimulationConfig } from "@/simulator/types";

export interface VehicleParams {
  /** Body length (m) */
  length: number;
  /** Jam distance s0 (m) */
  minGap: number;
  /** Desired time headway T (s) */
  timeHeadway: number;
  maxSpeed: number;
  maxAcceleration: number;
  maxDeceleration: number;
  /** Speeds below this count as waiting */
  stoppedSpeed: number;
}

export const vehicleParamsFromConfig = (config: SimulationConfig): VehicleParams => ({
  length: config.vehicleLength,
  minGap: config.vehicleMinGap,
  timeHeadway: config.vehicleTimeHeadway,
  maxSpeed: config.vehicleMaxSpeed,
  maxAcceleration: config.vehicleMaxAcceleration,
  maxDeceleration: config.vehicleMaxDeceleration,
  stoppedSpeed: config.vehicleStoppedSpeed,
});

export interface VehicleInit {
  id: number;
  path: readonly number[];
  spawnTime: number;
  params: VehicleParams;
  currentRoadIndexInPath?: number;
  /** Position along the current road (default 0) */
  x?: number;
  /** Initial speed (default: max speed) */
  v?: number;
}

export class Vehicle {
  readonly id: number;
  readonly path: readonly number[];
  readonly spawnTime: number;
  readonly params: VehicleParams;
  currentRoadIndexInPath: number;

  x: number;
  v: number;
  a = 0;
  stopped = false;

  /** World coordinates, kept in sync by the owning road */
  readonly position = new Vector2();

  /** Time the vehicle last dropped below `stoppedSpeed`, null while moving */
  waitingSince: number | null = null;

  private vMax: number;
  private readonly sqrtAb: number;

  constructor(init: VehicleInit) {
    this.id = init.id;
    this.path = init.path;
    this.spawnTime = init.spawnTime;
    this.params = init.params;
    this.currentRoadIndexInPath = init.currentRoadIndexInPath ?? 0;
    this.x = init.x ?? 0;
    this.v = init.v ?? init.params.maxSpeed;
    this.vMax = init.params.maxSpeed;
    this.sqrtAb = 2 * Math.sqrt(init.params.maxAcceleration * init.params.maxDeceleration);
  }

  get length(): number {
    return this.params.length;
  }

  /** Index of the road the vehicle is currently on */
  get currentRoadIndex(): number {
    return this.path[this.currentRoadIndexInPath];
  }

  /** Current speed limit (reduced inside a signal's slow zone) */
  get currentMaxSpeed(): number {
    return this.vMax;
  }

  hasNextRoad(): boolean {
    return this.currentRoadIndexInPath + 1 < this.path.length;
  }

  /**
   * Integrate one step, then recompute the IDM acceleration against `lead`
   * (the vehicle directly ahead on the same road, if any).
   */
  update(lead: Vehicle | undefined, dt: number, t: number): void {
    if (this.v + this.a * dt < 0) {
      this.x -= (0.5 * this.v * this.v) / this.a;
      this.v = 0;
    } else {
      this.v += this.a * dt;
      this.x += this.v * dt + (this.a * dt * dt) / 2;
    }

    let alpha = 0;
    if (lead) {
      const deltaX = lead.x - this.x - lead.length;
      const deltaV = this.v - lead.v;
      alpha =
        (this.params.minGap +
          Math.max(0, this.params.timeHeadway * this.v + (deltaV * this.v) / this.sqrtAb)) /
        deltaX;
    }

    this.a = this.params.maxAcceleration * (1 - (this.v / this.vMax) ** 4 - alpha ** 2);

    if (this.stopped) {
      this.a = (-this.params.maxDeceleration * this.v) / this.vMax;
    }

    if (this.v < this.params.stoppedSpeed) {
      if (this.waitingSince === null) this.waitingSince = t;
    } else {
      this.waitingSince = null;
    }
  }

  stop(): void {
    this.stopped = true;
  }

  unstop(): void {
    this.stopped = false;
  }

  slow(v: number): void {
    this.vMax = v;
  }

  unslow(): void {
    this.vMax = this.params.maxSpeed;
  }

  /** Journey time so far: spawn to `t` */
  getTotalWaitingTime(t: number): number {
    return t - this.spawnTime;
  }

  /** Length of the current standstill at `t` (0 while moving) */
  getCurrentWaitingTime(t: number): number {
    return this.waitingSince === null ? 0 : t - this.waitingSince;
  }

  /**
   * Copy of this vehicle placed at the start of the next road in its path.
   * The copy owns its own position vector; the original stays with the old road
   * until the caller removes it.
   */
  handOff(): Vehicle {
    const next = new Vehicle({
      id: this.id,
      path: this.path,
      spawnTime: this.spawnTime,
      params: this.params,
      currentRoadIndexInPath: this.currentRoadIndexInPath + 1,
      x: 0,
      v: this.v,
    });
    next.a = this.a;
    next.stopped = this.stopped;
    next.vMax = this.vMax;
    next.waitingSince = this.waitingSince;
    next.position.copy(this.position);
    return next;
  }
}
