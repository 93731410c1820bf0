// network/cfgLoader.ts
// roads.cfg / paths.cfg parsing (CSV with # comment lines)

import { readFileSync } from "node:fs";
import { join } from "node:path";
import Papa from "papaparse";
import { NetworkDefinitionError } from "@/common/errors";
import { devLog } from "@/logger";
import type { RoadDefinition } from "@/types/road";

// Raw CSV row types
interface RoadRow {
  road_name: string;
  start_x: string;
  start_y: string;
  end_x: string;
  end_y: string;
}

interface PathRow {
  path_name: string;
  axis: string;
  weight: string;
  roads: string;
}

export interface NetworkRoad {
  name: string;
  definition: RoadDefinition;
}

export interface NetworkPath {
  name: string;
  /** Signal group the path's inbound road belongs to */
  axis: string;
  weight: number;
  roadNames: string[];
}

export interface NetworkDefinition {
  roads: NetworkRoad[];
  paths: NetworkPath[];
}

// Shared CSV helper
export const parseCSV = <T>(content: string): T[] => {
  // drop # comment lines
  const cleanedContent = content
    .split("\n")
    .filter((line) => !line.trim().startsWith("#"))
    .join("\n");

  const result = Papa.parse<T>(cleanedContent, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
    transform: (value) => value.trim(),
  });

  if (result.errors.length > 0) {
    devLog.warn(`CSV parsing warnings: ${result.errors.map((e) => `row ${e.row}: ${e.message}`).join("; ")}`);
  }

  return result.data;
};

// "[A,B,C]" -> ["A", "B", "C"]
export const parseRoadList = (value: string | undefined): string[] => {
  if (!value) return [];

  const cleaned = value
    .replace(/^["']/, "")
    .replace(/["']$/, "")
    .replace(/^\[/, "")
    .replace(/\]$/, "");

  if (!cleaned) return [];

  return cleaned
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
};

const toNumber = (value: string | undefined): number => (value ? Number(value) : Number.NaN);

// roads.cfg
export const parseRoadsCFG = (content: string): NetworkRoad[] => {
  const roads: NetworkRoad[] = [];
  for (const row of parseCSV<RoadRow>(content)) {
    if (!row.road_name) continue;

    const coords = [row.start_x, row.start_y, row.end_x, row.end_y].map(toNumber);
    if (coords.some((c) => !Number.isFinite(c))) {
      devLog.warn(`roads.cfg: skipping ${row.road_name}, bad coordinates`);
      continue;
    }
    const [startX, startY, endX, endY] = coords;
    roads.push({ name: row.road_name, definition: [[startX, startY], [endX, endY]] });
  }

  if (roads.length === 0) {
    throw new NetworkDefinitionError("roads.cfg contains no usable roads");
  }
  return roads;
};

// paths.cfg
export const parsePathsCFG = (content: string): NetworkPath[] => {
  const paths: NetworkPath[] = [];
  for (const row of parseCSV<PathRow>(content)) {
    if (!row.path_name) continue;

    const weight = toNumber(row.weight);
    const roadNames = parseRoadList(row.roads);
    if (!Number.isFinite(weight) || weight < 0 || roadNames.length === 0) {
      devLog.warn(`paths.cfg: skipping ${row.path_name}, bad weight or empty road list`);
      continue;
    }
    paths.push({ name: row.path_name, axis: row.axis ?? "", weight, roadNames });
  }

  if (paths.length === 0) {
    throw new NetworkDefinitionError("paths.cfg contains no usable paths");
  }
  return paths;
};

/** Road names -> indices (position in roads.cfg) */
export const resolveRoadNames = (roadNames: readonly string[], roadNameToIndex: ReadonlyMap<string, number>): number[] =>
  roadNames.map((name) => {
    const index = roadNameToIndex.get(name);
    if (index === undefined) {
      throw new NetworkDefinitionError(`Unknown road name "${name}" in path`);
    }
    return index;
  });

export const loadNetworkFolder = (folder: string): NetworkDefinition => {
  const roads = parseRoadsCFG(readFileSync(join(folder, "roads.cfg"), "utf-8"));
  const paths = parsePathsCFG(readFileSync(join(folder, "paths.cfg"), "utf-8"));
  devLog.debug(`Loaded ${roads.length} roads, ${paths.length} paths from ${folder}`);
  return { roads, paths };
};
