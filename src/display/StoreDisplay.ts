// display/StoreDisplay.ts
// Display that mirrors each tick into a simulation store

import type { SimulationStore } from "@/store/simulation/simulationStore";
import type { Display, SimulationSnapshot } from "@/simulator/types";

export interface SnapshotSource {
  snapshot(): SimulationSnapshot;
}

export class StoreDisplay implements Display {
  private readonly store: SimulationStore;
  private readonly source: SnapshotSource;

  constructor(store: SimulationStore, source: SnapshotSource) {
    this.store = store;
    this.source = source;
  }

  update(): void {
    this.store.getState().setSnapshot(this.source.snapshot());
  }

  get closed(): boolean {
    return this.store.getState().closed;
  }
}
