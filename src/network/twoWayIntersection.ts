// network/twoWayIntersection.ts
// Four-arm signalised junction: west-east and south-north through traffic

import { fileURLToPath } from "node:url";
import { getSlowDistance, getSlowFactor, getStopDistance } from "@/config/simulationConfig";
import type { Rng } from "@/common/random";
import { findIntersectingRoads } from "@/utils/geometry/calculateDistance";
import type { SignalPhase } from "@/types/road";
import { Simulation } from "@/simulator/core/Simulation";
import type { TrafficSignal } from "@/simulator/signal/TrafficSignal";
import type { SimulationConfig } from "@/simulator/types";
import { loadNetworkFolder, resolveRoadNames } from "./cfgLoader";

export const TWO_WAY_INTERSECTION_FOLDER = fileURLToPath(
  new URL("../../public/networkConfig/two_way_intersection", import.meta.url)
);

/** [west-east, south-north]: SN green -> all red -> WE green -> all red */
export const TWO_WAY_CYCLE: readonly SignalPhase[] = [
  [false, true],
  [false, false],
  [true, false],
  [false, false],
];

export interface TwoWayIntersectionOptions {
  generationLimit?: number | null;
  /** Vehicles per minute */
  vehicleRate: number;
  config?: Partial<SimulationConfig>;
  rng?: Rng;
  folder?: string;
}

export interface TwoWayIntersection {
  sim: Simulation;
  signal: TrafficSignal;
  /** Inbound road indices per signal group */
  inbound: {
    westEast: number[];
    southNorth: number[];
  };
  /** Roads inside the junction box */
  crossing: number[];
}

export function buildTwoWayIntersection(options: TwoWayIntersectionOptions): TwoWayIntersection {
  const network = loadNetworkFolder(options.folder ?? TWO_WAY_INTERSECTION_FOLDER);
  const sim = new Simulation({
    generationLimit: options.generationLimit,
    config: options.config,
    rng: options.rng,
  });

  const definitions = network.roads.map((road) => road.definition);
  sim.addRoads(definitions);

  const intersections = findIntersectingRoads(definitions);
  sim.addIntersections(intersections);

  const roadNameToIndex = new Map(network.roads.map((road, index) => [road.name, index]));
  const paths = network.paths.map((path) => ({
    axis: path.axis,
    weight: path.weight,
    roads: resolveRoadNames(path.roadNames, roadNameToIndex),
  }));

  sim.addGenerator(
    options.vehicleRate,
    paths.map(({ weight, roads }) => ({ weight, roads }))
  );

  const inboundOf = (axis: string) => [
    ...new Set(paths.filter((path) => path.axis === axis).map((path) => path.roads[0])),
  ];
  const inbound = {
    westEast: inboundOf("we"),
    southNorth: inboundOf("sn"),
  };

  const signal = sim.addTrafficSignal(
    [inbound.westEast, inbound.southNorth],
    TWO_WAY_CYCLE,
    getSlowDistance(),
    getSlowFactor(),
    getStopDistance()
  );

  return {
    sim,
    signal,
    inbound,
    crossing: [...intersections.keys()].sort((a, b) => a - b),
  };
}
