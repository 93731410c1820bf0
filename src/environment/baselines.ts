// environment/baselines.ts
// Non-learning signal policies used as reference points for trained agents

import { devLog } from "@/logger";
import type { Simulation } from "@/simulator/core/Simulation";
import type { Environment, EnvironmentState } from "./Environment";

/** Minimum simulated seconds between two switches */
export const SWITCH_INTERVAL = 15;

export type BaselinePolicy = (sim: Simulation, state: EnvironmentState) => boolean;

/** Switch every SWITCH_INTERVAL seconds */
export const fixedCycleAction: BaselinePolicy = (sim) => {
  const signal = sim.trafficSignals.at(0);
  if (!signal) return false;

  if (sim.t - signal.prevUpdateTime >= SWITCH_INTERVAL) {
    signal.prevUpdateTime = sim.t;
    return true;
  }
  return false;
};

/** After SWITCH_INTERVAL seconds, switch only if the red axis has the longer queue */
export const longestQueueAction: BaselinePolicy = (sim, state) => {
  const signal = sim.trafficSignals.at(0);
  if (!signal) return false;

  let switchSignal = false;
  if (sim.t - signal.prevUpdateTime >= SWITCH_INTERVAL) {
    const [westEastGreen, westEastQueue, southNorthQueue] = state;
    if (westEastGreen && westEastQueue < southNorthQueue) {
      switchSignal = true;
    } else if (!westEastGreen && westEastQueue > southNorthQueue) {
      switchSignal = true;
    }
  }
  if (switchSignal) {
    signal.prevUpdateTime = sim.t;
  }
  return switchSignal;
};

export const BASELINE_POLICIES = {
  fc: fixedCycleAction,
  lqf: longestQueueAction,
} as const;

export type BaselinePolicyName = keyof typeof BASELINE_POLICIES;

export interface EpisodeResult {
  episode: number;
  collided: boolean;
  /** Average journey time; null for an episode that ended in a collision */
  waitTime: number | null;
  score: number;
}

export interface BaselineReport {
  episodes: EpisodeResult[];
  /** Mean of the per-episode wait times over collision-free episodes */
  averageWaitTime: number;
  collisionsPerEpisode: number;
  /** The display closed before all episodes finished */
  truncated: boolean;
}

/** Safety cap on steps per episode */
const MAX_STEPS_PER_EPISODE = 10_000;

export function runBaseline(
  environment: Environment,
  nEpisodes: number,
  policy: BaselinePolicy,
  render: boolean = false
): BaselineReport {
  const episodes: EpisodeResult[] = [];
  let truncated = false;

  for (let episode = 1; episode <= nEpisodes && !truncated; episode++) {
    let state = environment.reset(render);
    let score = 0;
    let done = false;

    for (let step = 0; step < MAX_STEPS_PER_EPISODE && !done; step++) {
      const action = policy(environment.sim, state);
      const result = environment.step(action);
      state = result.state;
      score += result.reward;
      done = result.done;
      if (result.truncated) {
        truncated = true;
        break;
      }
    }
    if (truncated) break;

    const collided = environment.sim.collisionDetected;
    const waitTime = collided ? null : environment.sim.getAverageWaitTime();
    episodes.push({ episode, collided, waitTime, score });

    if (collided) {
      devLog.info(`Episode ${episode} - Collisions: 1`);
    } else {
      devLog.info(`Episode ${episode} - Wait time: ${environment.sim.getAverageWaitTime().toFixed(2)}`);
    }
  }

  const completed = episodes.filter((e) => !e.collided);
  const totalWait = completed.reduce((total, e) => total + (e.waitTime ?? 0), 0);
  const collisions = episodes.length - completed.length;

  const report: BaselineReport = {
    episodes,
    averageWaitTime: completed.length > 0 ? totalWait / completed.length : 0,
    collisionsPerEpisode: episodes.length > 0 ? collisions / episodes.length : 0,
    truncated,
  };

  devLog.info(
    `Results after ${episodes.length} episodes: avg wait per completed episode ` +
      `${report.averageWaitTime.toFixed(2)}, collisions per episode ${report.collisionsPerEpisode.toFixed(2)}`
  );
  return report;
}
