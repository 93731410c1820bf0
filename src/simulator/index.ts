// simulator/index.ts

export { Simulation, type SimulationOptions, type SignalAction, type InsertVehicleOptions } from "./core/Simulation";
export {
  executeSimulationStep,
  advanceRoads,
  generateVehicles,
  transferLeadVehicles,
  detectCollisions,
  isGenerationCapReached,
  type SimulationState,
  type SimulationStepContext,
  type TransferResult,
} from "./core/simulation-step";
export { checkCollisions, type CollisionCheckContext } from "./core/collisionCheck";
export { reduceIntersections, mergeIntersections, type IntersectionInput } from "./core/intersections";
export { Road, type RoadSignal } from "./road/Road";
export { RoadVehicleQueue } from "./road/RoadVehicleQueue";
export { Vehicle, vehicleParamsFromConfig, type VehicleParams, type VehicleInit } from "./road/Vehicle";
export { TrafficSignal } from "./signal/TrafficSignal";
export { VehicleGenerator, type VehicleGeneratorInit } from "./generator/VehicleGenerator";
export {
  createDefaultConfig,
  type SimulationConfig,
  type Display,
  type CollisionPair,
  type SimulationSnapshot,
  type VehicleSnapshot,
} from "./types";
