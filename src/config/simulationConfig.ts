// Simulation configuration (all simulation logic parameters)
import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { ConfigLoadError } from "@/common/errors";
import type { SimulationConfig } from "@/simulator/types";

/** Collision scan strategy: stop at the first close pair, or collect all of them */
export type CollisionMode = "first" | "all";

export type LogLevelName = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface SimulationConfigFile {
  simulation: {
    /** Fixed tick length (s) */
    dt: number;
    /** Ticks run by `run()` when the caller gives no count */
    defaultRunTicks: number;
    /** Ticks spent in the intermediate signal phase after an action */
    actionTransitionTicks: number;
    /** Two vehicles on crossing roads closer than this collide (m) */
    collisionRadius: number;
    collisionMode: CollisionMode;
    /** Generator RNG seed */
    seed: number;
  };
  vehicle: {
    length: number;
    minGap: number;
    timeHeadway: number;
    maxSpeed: number;
    maxAcceleration: number;
    maxDeceleration: number;
    /** Below this speed a vehicle counts as waiting (m/s) */
    stoppedSpeed: number;
  };
  signal: {
    slowDistance: number;
    slowFactor: number;
    stopDistance: number;
  };
  environment: {
    generationLimit: number;
    vehicleRate: number;
    stepTicks: number;
    collisionPenalty: number;
  };
  log: {
    /** DevLogger on/off */
    devLogEnabled: boolean;
    level: LogLevelName;
    /** Append log lines to this file as well as the console */
    file: string | null;
  };
}

const DEFAULT_CONFIG_FILE: SimulationConfigFile = {
  simulation: {
    dt: 1 / 60,
    defaultRunTicks: 200,
    actionTransitionTicks: 200,
    collisionRadius: 2,
    collisionMode: "first",
    seed: 42,
  },
  vehicle: {
    length: 4,
    minGap: 4,
    timeHeadway: 1,
    maxSpeed: 16.6,
    maxAcceleration: 1.44,
    maxDeceleration: 4.61,
    stoppedSpeed: 0.1,
  },
  signal: {
    slowDistance: 50,
    slowFactor: 0.4,
    stopDistance: 15,
  },
  environment: {
    generationLimit: 50,
    vehicleRate: 20,
    stepTicks: 200,
    collisionPenalty: 100,
  },
  log: {
    devLogEnabled: true,
    level: "INFO",
    file: null,
  },
};

export const DEFAULT_SIMULATION_CONFIG_PATH = fileURLToPath(
  new URL("../../public/config/simulationConfig.json", import.meta.url)
);

const LOG_LEVELS: readonly LogLevelName[] = ["DEBUG", "INFO", "WARN", "ERROR"];

type Section = Record<string, unknown>;

const asSection = (value: unknown): Section => {
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
};

const readNumber = (section: Section, key: string, fallback: number): number => {
  const value = section[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
};

const readBoolean = (section: Section, key: string, fallback: boolean): boolean => {
  const value = section[key];
  return typeof value === "boolean" ? value : fallback;
};

const readCollisionMode = (section: Section, fallback: CollisionMode): CollisionMode => {
  const value = section.collisionMode;
  return value === "first" || value === "all" ? value : fallback;
};

const readLogLevel = (section: Section, fallback: LogLevelName): LogLevelName => {
  const value = section.level;
  return LOG_LEVELS.find((level) => level === value) ?? fallback;
};

const readFile = (section: Section, fallback: string | null): string | null => {
  const value = section.file;
  if (value === null) return null;
  return typeof value === "string" && value.length > 0 ? value : fallback;
};

/**
 * Overlay a parsed (partial) config object on top of the defaults.
 * Unknown keys are ignored, mistyped values keep the default.
 */
export const mergeConfigFile = (
  raw: unknown,
  base: SimulationConfigFile = DEFAULT_CONFIG_FILE
): SimulationConfigFile => {
  const root = asSection(raw);
  const simulation = asSection(root.simulation);
  const vehicle = asSection(root.vehicle);
  const signal = asSection(root.signal);
  const environment = asSection(root.environment);
  const log = asSection(root.log);

  return {
    simulation: {
      dt: readNumber(simulation, "dt", base.simulation.dt),
      defaultRunTicks: readNumber(simulation, "defaultRunTicks", base.simulation.defaultRunTicks),
      actionTransitionTicks: readNumber(
        simulation,
        "actionTransitionTicks",
        base.simulation.actionTransitionTicks
      ),
      collisionRadius: readNumber(simulation, "collisionRadius", base.simulation.collisionRadius),
      collisionMode: readCollisionMode(simulation, base.simulation.collisionMode),
      seed: readNumber(simulation, "seed", base.simulation.seed),
    },
    vehicle: {
      length: readNumber(vehicle, "length", base.vehicle.length),
      minGap: readNumber(vehicle, "minGap", base.vehicle.minGap),
      timeHeadway: readNumber(vehicle, "timeHeadway", base.vehicle.timeHeadway),
      maxSpeed: readNumber(vehicle, "maxSpeed", base.vehicle.maxSpeed),
      maxAcceleration: readNumber(vehicle, "maxAcceleration", base.vehicle.maxAcceleration),
      maxDeceleration: readNumber(vehicle, "maxDeceleration", base.vehicle.maxDeceleration),
      stoppedSpeed: readNumber(vehicle, "stoppedSpeed", base.vehicle.stoppedSpeed),
    },
    signal: {
      slowDistance: readNumber(signal, "slowDistance", base.signal.slowDistance),
      slowFactor: readNumber(signal, "slowFactor", base.signal.slowFactor),
      stopDistance: readNumber(signal, "stopDistance", base.signal.stopDistance),
    },
    environment: {
      generationLimit: readNumber(environment, "generationLimit", base.environment.generationLimit),
      vehicleRate: readNumber(environment, "vehicleRate", base.environment.vehicleRate),
      stepTicks: readNumber(environment, "stepTicks", base.environment.stepTicks),
      collisionPenalty: readNumber(environment, "collisionPenalty", base.environment.collisionPenalty),
    },
    log: {
      devLogEnabled: readBoolean(log, "devLogEnabled", base.log.devLogEnabled),
      level: readLogLevel(log, base.log.level),
      file: readFile(log, base.log.file),
    },
  };
};

type WarningSink = (message: string) => void;

// The logger reads this module while it is built, so warnings wait here until it registers
let pendingWarnings: string[] = [];
let warningSink: WarningSink | null = null;

const warnConfig = (message: string): void => {
  if (warningSink) {
    warningSink(message);
  } else {
    pendingWarnings.push(message);
  }
};

/** Route config warnings to `sink`, replaying any raised before it was set */
export const setConfigWarningSink = (sink: WarningSink): void => {
  warningSink = sink;
  const queued = pendingWarnings;
  pendingWarnings = [];
  for (const message of queued) sink(message);
};

/**
 * Load simulation configuration from a JSON file.
 * A missing file falls back to the defaults; a file that is not JSON throws.
 */
export const loadSimulationConfigFile = (path: string): SimulationConfigFile => {
  if (!existsSync(path)) {
    warnConfig(`${path} not found, using defaults`);
    return mergeConfigFile({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigLoadError(path, error instanceof Error ? error.message : String(error));
  }
  return mergeConfigFile(parsed);
};

// Load config immediately
let simulationConfig: SimulationConfigFile = loadSimulationConfigFile(
  process.env.TRAFFIC_SIM_CONFIG ?? DEFAULT_SIMULATION_CONFIG_PATH
);

/** Replace the active configuration (e.g. to load a scenario-specific file) */
export const setSimulationConfigFile = (config: SimulationConfigFile): void => {
  simulationConfig = config;
};

export const getSimulationConfigFile = (): SimulationConfigFile => simulationConfig;

// Export synchronous getter (flattened for SimulationConfig type)
export const getSimulationConfig = (): SimulationConfig => {
  return {
    // Simulation
    dt: simulationConfig.simulation.dt,
    defaultRunTicks: simulationConfig.simulation.defaultRunTicks,
    actionTransitionTicks: simulationConfig.simulation.actionTransitionTicks,
    collisionRadius: simulationConfig.simulation.collisionRadius,
    collisionMode: simulationConfig.simulation.collisionMode,
    seed: simulationConfig.simulation.seed,

    // Vehicle
    vehicleLength: simulationConfig.vehicle.length,
    vehicleMinGap: simulationConfig.vehicle.minGap,
    vehicleTimeHeadway: simulationConfig.vehicle.timeHeadway,
    vehicleMaxSpeed: simulationConfig.vehicle.maxSpeed,
    vehicleMaxAcceleration: simulationConfig.vehicle.maxAcceleration,
    vehicleMaxDeceleration: simulationConfig.vehicle.maxDeceleration,
    vehicleStoppedSpeed: simulationConfig.vehicle.stoppedSpeed,
  };
};

// Individual getters - Signal
export const getSlowDistance = () => simulationConfig.signal.slowDistance;
export const getSlowFactor = () => simulationConfig.signal.slowFactor;
export const getStopDistance = () => simulationConfig.signal.stopDistance;

// Individual getters - Environment
export const getGenerationLimit = () => simulationConfig.environment.generationLimit;
export const getVehicleRate = () => simulationConfig.environment.vehicleRate;
export const getStepTicks = () => simulationConfig.environment.stepTicks;
export const getCollisionPenalty = () => simulationConfig.environment.collisionPenalty;

// Individual getters - Log
export const getDevLogEnabled = () => simulationConfig.log.devLogEnabled;
export const getLogLevel = () => simulationConfig.log.level;
export const getLogFile = () => simulationConfig.log.file;
