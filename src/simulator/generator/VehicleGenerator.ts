// simulator/generator/VehicleGenerator.ts
// Rate-limited vehicle injection onto inbound roads with weighted random paths

import { pickWeightedIndex, type Rng } from "@/common/random";
import type { GeneratorPath } from "@/types/road";
import type { Road } from "@/simulator/road/Road";
import { Vehicle, type VehicleParams } from "@/simulator/road/Vehicle";

export interface VehicleGeneratorInit {
  /** Vehicles per minute */
  vehicleRate: number;
  paths: readonly GeneratorPath[];
  /** Roads a path may start on, keyed by road index */
  inboundRoads: ReadonlyMap<number, Road>;
  rng: Rng;
  params: VehicleParams;
}

export class VehicleGenerator {
  readonly vehicleRate: number;
  readonly paths: readonly GeneratorPath[];
  lastAddedTime = 0;

  private readonly inboundRoads: ReadonlyMap<number, Road>;
  private readonly rng: Rng;
  private readonly params: VehicleParams;
  private readonly weights: number[];
  private upcoming: GeneratorPath;

  constructor(init: VehicleGeneratorInit) {
    this.vehicleRate = init.vehicleRate;
    this.paths = init.paths;
    this.inboundRoads = init.inboundRoads;
    this.rng = init.rng;
    this.params = init.params;
    this.weights = init.paths.map((path) => path.weight);
    this.upcoming = this.pickPath();
  }

  /** Seconds between two spawn attempts */
  get interval(): number {
    return 60 / this.vehicleRate;
  }

  /** Path the next vehicle will take */
  get upcomingPath(): GeneratorPath {
    return this.upcoming;
  }

  /**
   * Try to place the upcoming vehicle once the spawn interval has elapsed.
   * The vehicle is placed only if its inbound road has room at the start;
   * either way a new upcoming path is drawn.
   * @returns index of the road that received a vehicle, or null
   */
  update(t: number, generatedSoFar: number): number | null {
    if (t - this.lastAddedTime < this.interval) return null;

    let placedOn: number | null = null;
    const path = this.upcoming;
    const road = this.inboundRoads.get(path.roads[0]);

    if (road) {
      const last = road.vehicles.last();
      if (!last || last.x > this.params.minGap + this.params.length) {
        road.push(
          new Vehicle({
            id: generatedSoFar,
            path: path.roads,
            spawnTime: t,
            params: this.params,
          })
        );
        this.lastAddedTime = t;
        placedOn = road.index;
      }
    }

    this.upcoming = this.pickPath();
    return placedOn;
  }

  private pickPath(): GeneratorPath {
    const index = pickWeightedIndex(this.weights, this.rng);
    return this.paths[index < 0 ? 0 : index];
  }
}
