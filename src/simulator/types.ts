// simulator/types.ts
// Shared types for the simulator

import type { CollisionMode } from "@/config/simulationConfig";

// ============================================================================
// [1] SIMULATION CONFIG
// ============================================================================

export interface SimulationConfig {
  // Timing
  dt: number;
  defaultRunTicks: number;
  actionTransitionTicks: number;

  // Collision
  collisionRadius: number;
  collisionMode: CollisionMode;

  // Generation
  seed: number;

  // Vehicle (IDM)
  vehicleLength: number;
  vehicleMinGap: number;
  vehicleTimeHeadway: number;
  vehicleMaxSpeed: number;
  vehicleMaxAcceleration: number;
  vehicleMaxDeceleration: number;
  vehicleStoppedSpeed: number;
}

// Default config factory
export function createDefaultConfig(): SimulationConfig {
  return {
    dt: 1 / 60,
    defaultRunTicks: 200,
    actionTransitionTicks: 200,
    collisionRadius: 2,
    collisionMode: "first",
    seed: 42,
    vehicleLength: 4,
    vehicleMinGap: 4,
    vehicleTimeHeadway: 1,
    vehicleMaxSpeed: 16.6,
    vehicleMaxAcceleration: 1.44,
    vehicleMaxDeceleration: 4.61,
    vehicleStoppedSpeed: 0.1,
  };
}

// ============================================================================
// [2] DISPLAY COLLABORATOR
// ============================================================================

/** Optional observer notified once per tick; `closed` cancels the run between ticks */
export interface Display {
  update(): void;
  readonly closed: boolean;
}

// ============================================================================
// [3] COLLISIONS
// ============================================================================

export interface CollisionPair {
  roadIndex: number;
  vehicleId: number;
  otherRoadIndex: number;
  otherVehicleId: number;
  distance: number;
}

// ============================================================================
// [4] SNAPSHOT
// ============================================================================

export interface VehicleSnapshot {
  id: number;
  roadIndex: number;
  x: number;
  v: number;
  position: { x: number; y: number };
}

export interface SimulationSnapshot {
  t: number;
  vehiclesGenerated: number;
  vehiclesOnMap: number;
  nonEmptyRoads: number[];
  collisionDetected: boolean;
  completed: boolean;
  averageWaitTime: number;
  /** Current phase of every signal, in registration order */
  signalPhases: boolean[][];
  vehicles: VehicleSnapshot[];
}
