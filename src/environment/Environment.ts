// environment/Environment.ts
// RL wrapper around the two-way intersection: reset() / step(action)

import { createRng, normalizeSeed } from "@/common/random";
import {
  getCollisionPenalty,
  getGenerationLimit,
  getSimulationConfig,
  getStepTicks,
  getVehicleRate,
} from "@/config/simulationConfig";
import { StoreDisplay } from "@/display/StoreDisplay";
import { buildTwoWayIntersection, type TwoWayIntersection } from "@/network/twoWayIntersection";
import type { Simulation, SignalAction } from "@/simulator/core/Simulation";
import type { SimulationConfig } from "@/simulator/types";
import { createSimulationStore, type SimulationStore } from "@/store/simulation/simulationStore";

/** [west-east green, west-east queue, south-north queue, junction occupied] */
export type EnvironmentState = readonly [
  westEastGreen: boolean,
  westEastQueue: number,
  southNorthQueue: number,
  junctionOccupied: boolean,
];

export interface StepResult {
  state: EnvironmentState;
  reward: number;
  /** Episode reached a terminal state */
  done: boolean;
  /** Display closed: external stop, not an episode end */
  truncated: boolean;
}

export interface EnvironmentOptions {
  generationLimit?: number;
  vehicleRate?: number;
  /** Ticks simulated per step after the action */
  stepTicks?: number;
  collisionPenalty?: number;
  config?: Partial<SimulationConfig>;
  /** Base seed (default: simulation.seed from config); episode k uses seed + k */
  seed?: number;
  networkFolder?: string;
}

export class Environment {
  private readonly options: EnvironmentOptions;
  private readonly generationLimit: number;
  private readonly vehicleRate: number;
  private readonly stepTicks: number;
  private readonly collisionPenalty: number;
  private episode = 0;
  private network: TwoWayIntersection | null = null;
  private renderStore: SimulationStore | null = null;

  constructor(options: EnvironmentOptions = {}) {
    this.options = options;
    this.generationLimit = options.generationLimit ?? getGenerationLimit();
    this.vehicleRate = options.vehicleRate ?? getVehicleRate();
    this.stepTicks = options.stepTicks ?? getStepTicks();
    this.collisionPenalty = options.collisionPenalty ?? getCollisionPenalty();
  }

  get sim(): Simulation {
    return this.requireNetwork().sim;
  }

  /** Store fed by the display when the episode renders */
  get store(): SimulationStore | null {
    return this.renderStore;
  }

  get episodeCount(): number {
    return this.episode;
  }

  /** Start a fresh episode; with `render`, mirror every tick into `store` */
  reset(render: boolean = false): EnvironmentState {
    this.episode += 1;
    const configSeed = { ...getSimulationConfig(), ...this.options.config }.seed;
    const seed = normalizeSeed(this.options.seed ?? configSeed) + this.episode;

    this.network = buildTwoWayIntersection({
      generationLimit: this.generationLimit,
      vehicleRate: this.vehicleRate,
      config: this.options.config,
      rng: createRng(seed),
      folder: this.options.networkFolder,
    });

    if (render) {
      this.renderStore ??= createSimulationStore();
      this.renderStore.getState().reopen();
      this.network.sim.attachDisplay(new StoreDisplay(this.renderStore, this.network.sim));
    }

    return this.getState();
  }

  step(action: SignalAction): StepResult {
    const { sim } = this.requireNetwork();
    sim.run(action, this.stepTicks);
    return {
      state: this.getState(),
      reward: this.computeReward(),
      done: sim.completed,
      truncated: sim.displayClosed,
    };
  }

  getState(): EnvironmentState {
    const { sim, signal, inbound, crossing } = this.requireNetwork();
    const queueOf = (roads: readonly number[]) =>
      roads.reduce((total, i) => total + sim.roads[i].vehicles.size, 0);

    return [
      signal.currentCycle[0] ?? false,
      queueOf(inbound.westEast),
      queueOf(inbound.southNorth),
      crossing.some((i) => sim.nonEmptyRoads.has(i)),
    ];
  }

  /** -penalty on collision, otherwise minus the current standstill time summed over inbound vehicles */
  private computeReward(): number {
    const { sim, inbound } = this.requireNetwork();
    if (sim.collisionDetected) return -this.collisionPenalty;

    let waiting = 0;
    for (const i of [...inbound.westEast, ...inbound.southNorth]) {
      for (const vehicle of sim.roads[i].vehicles) {
        waiting += vehicle.getCurrentWaitingTime(sim.t);
      }
    }
    return -waiting;
  }

  private requireNetwork(): TwoWayIntersection {
    if (!this.network) {
      throw new Error("Environment.reset() must be called before stepping");
    }
    return this.network;
  }
}
