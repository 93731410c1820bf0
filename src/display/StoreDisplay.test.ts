import { describe, it, expect } from "vitest";
import { Simulation } from "@/simulator/core/Simulation";
import { createDefaultConfig } from "@/simulator/types";
import { createSimulationStore } from "@/store/simulation/simulationStore";
import { StoreDisplay } from "./StoreDisplay";

const config = createDefaultConfig();

const setup = () => {
  const sim = new Simulation({ config });
  sim.addRoad([0, 0], [100, 0]);
  const store = createSimulationStore();
  sim.attachDisplay(new StoreDisplay(store, sim));
  return { sim, store };
};

describe("StoreDisplay", () => {
  it("publishes the initial state on attach and one snapshot per tick", () => {
    const { sim, store } = setup();
    expect(store.getState().frames).toBe(1);
    expect(store.getState().snapshot?.t).toBe(0);

    sim.insertVehicle([0]);
    sim.run(false, 5);

    expect(store.getState().frames).toBe(6);
    expect(store.getState().snapshot?.t).toBeCloseTo(5 * config.dt, 10);
    expect(store.getState().snapshot?.vehicles).toHaveLength(1);
  });

  it("stops the run when the store closes", () => {
    const { sim, store } = setup();
    store.subscribe((state) => {
      if (state.frames === 3 && !state.closed) state.close();
    });

    sim.run(false, 100);

    expect(sim.displayClosed).toBe(true);
    expect(store.getState().frames).toBe(3);
    expect(sim.t).toBeCloseTo(2 * config.dt, 10);
  });
});
