// simulator/road/Road.ts
// Straight road segment owning an ordered vehicle queue

import { Vector2 } from "three";
import type { Point } from "@/types/road";
import { calculateDirection, calculateStraightDistance } from "@/utils/geometry/calculateDistance";
import { RoadVehicleQueue } from "./RoadVehicleQueue";
import type { Vehicle } from "./Vehicle";

/** What a road needs from the signal controlling it */
export interface RoadSignal {
  readonly slowDistance: number;
  readonly slowFactor: number;
  readonly stopDistance: number;
  isGreen(group: number): boolean;
}

export class Road {
  readonly index: number;
  readonly start: Point;
  readonly end: Point;
  readonly length: number;
  /** Unit vector start -> end */
  readonly direction: Vector2;
  readonly vehicles = new RoadVehicleQueue<Vehicle>();

  private signal: RoadSignal | null = null;
  private signalGroup = -1;

  constructor(start: Point, end: Point, index: number) {
    this.start = start;
    this.end = end;
    this.index = index;
    this.length = calculateStraightDistance(start, end);
    this.direction = calculateDirection(start, end);
  }

  setTrafficSignal(signal: RoadSignal, group: number): void {
    this.signal = signal;
    this.signalGroup = group;
  }

  get hasTrafficSignal(): boolean {
    return this.signal !== null;
  }

  /** Green when uncontrolled */
  get trafficSignalState(): boolean {
    return this.signal ? this.signal.isGreen(this.signalGroup) : true;
  }

  /** World coordinates of the point `x` along the road */
  pointAt(x: number, target: Vector2 = new Vector2()): Vector2 {
    return target.set(this.start[0] + this.direction.x * x, this.start[1] + this.direction.y * x);
  }

  /** Append a vehicle at the back of the queue */
  push(vehicle: Vehicle): void {
    this.vehicles.push(vehicle);
    this.pointAt(vehicle.x, vehicle.position);
  }

  update(dt: number, t: number): void {
    const n = this.vehicles.size;
    const lead = this.vehicles.peek();
    if (!lead) return;

    lead.update(undefined, dt, t);
    for (let i = 1; i < n; i++) {
      const vehicle = this.vehicles.at(i);
      if (vehicle) vehicle.update(this.vehicles.at(i - 1), dt, t);
    }

    if (this.trafficSignalState) {
      lead.unstop();
      for (const vehicle of this.vehicles) {
        vehicle.unslow();
      }
    } else if (this.signal) {
      const { slowDistance, slowFactor, stopDistance } = this.signal;
      if (lead.x >= this.length - slowDistance) {
        lead.slow(slowFactor * lead.params.maxSpeed);
      }
      if (lead.x >= this.length - stopDistance && lead.x <= this.length - stopDistance / 2) {
        lead.stop();
      }
    }

    for (const vehicle of this.vehicles) {
      this.pointAt(vehicle.x, vehicle.position);
    }
  }
}
