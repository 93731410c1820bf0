// store/simulation/simulationStore.ts
// Vanilla zustand store holding the latest simulation snapshot for observers

import { createStore, type StoreApi } from "zustand/vanilla";
import type { SimulationSnapshot } from "@/simulator/types";

interface SimulationStoreState {
  // State
  snapshot: SimulationSnapshot | null;
  /** Number of snapshots received since creation */
  frames: number;
  /** Set when an observer asks the run to stop */
  closed: boolean;

  // Actions
  setSnapshot: (snapshot: SimulationSnapshot) => void;
  close: () => void;
  reopen: () => void;
}

export type SimulationStore = StoreApi<SimulationStoreState>;
export type { SimulationStoreState };

export const createSimulationStore = (): SimulationStore =>
  createStore<SimulationStoreState>()((set) => ({
    snapshot: null,
    frames: 0,
    closed: false,

    setSnapshot: (snapshot) =>
      set((state) => ({
        snapshot,
        frames: state.frames + 1,
      })),

    close: () => set({ closed: true }),

    reopen: () => set({ closed: false }),
  }));
