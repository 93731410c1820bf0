// Public entry point

export * from "./simulator";
export { NetworkDefinitionError, ConfigLoadError } from "./common/errors";
export { createRng, normalizeSeed, pickWeightedIndex, type Rng } from "./common/random";
export {
  getSimulationConfig,
  getSimulationConfigFile,
  loadSimulationConfigFile,
  setSimulationConfigFile,
  type CollisionMode,
  type SimulationConfigFile,
} from "./config/simulationConfig";
export { loadMqttConfig, buildTopic, TOPICS, type MqttConfig } from "./config/mqttConfig";
export { DevLogger, devLog } from "./logger";
export { findIntersectingRoads } from "./utils/geometry/calculateDistance";
export type { GeneratorPath, IntersectionMap, Point, RoadDefinition, SignalPhase } from "./types/road";
export { loadNetworkFolder, parsePathsCFG, parseRoadsCFG, type NetworkDefinition } from "./network/cfgLoader";
export {
  buildTwoWayIntersection,
  TWO_WAY_CYCLE,
  TWO_WAY_INTERSECTION_FOLDER,
  type TwoWayIntersection,
  type TwoWayIntersectionOptions,
} from "./network/twoWayIntersection";
export { createSimulationStore, type SimulationStore } from "./store/simulation/simulationStore";
export { StoreDisplay } from "./display/StoreDisplay";
export { MqttTelemetryBridge, connectTelemetryClient, type TelemetryClient } from "./display/MqttTelemetryBridge";
export { Environment, type EnvironmentOptions, type EnvironmentState, type StepResult } from "./environment/Environment";
export {
  BASELINE_POLICIES,
  SWITCH_INTERVAL,
  fixedCycleAction,
  longestQueueAction,
  runBaseline,
  type BaselinePolicy,
  type BaselineReport,
} from "./environment/baselines";
