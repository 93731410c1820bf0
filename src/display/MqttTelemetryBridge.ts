// display/MqttTelemetryBridge.ts
// Publishes store snapshots over MQTT; a STOP message closes the store (and so the run)
//
// Topic Format: {PREFIX}/simulation/{SERVICE}
// Example: SIGNALSIM/simulation/STATUS

import { connect } from "mqtt";
import { buildTopic, loadMqttConfig, TOPICS, type MqttConfig } from "@/config/mqttConfig";
import { devLog } from "@/logger";
import type { SimulationStore } from "@/store/simulation/simulationStore";

/** The slice of an MQTT client the bridge uses */
export interface TelemetryClient {
  publish(topic: string, message: string): void;
  subscribe(topic: string): void;
  onMessage(listener: (topic: string, payload: string) => void): void;
  end(): void;
}

export const connectTelemetryClient = (url: string): TelemetryClient => {
  const client = connect(url);

  client.on("connect", () => {
    devLog.info(`Connected to MQTT broker ${url}`);
  });

  client.on("error", (err) => {
    devLog.error(`MQTT Client Error: ${err.message}`);
  });

  return {
    publish: (topic, message) => {
      client.publish(topic, message, (err) => {
        if (err) {
          devLog.error(`Failed to publish to ${topic}: ${err.message}`);
        }
      });
    },
    subscribe: (topic) => {
      client.subscribe(topic, (err) => {
        if (err) {
          devLog.error(`Failed to subscribe to ${topic}: ${err.message}`);
        }
      });
    },
    onMessage: (listener) => {
      client.on("message", (topic, payload) => listener(topic, payload.toString()));
    },
    end: () => {
      client.end();
    },
  };
};

export class MqttTelemetryBridge {
  private readonly store: SimulationStore;
  private readonly client: TelemetryClient;
  private readonly config: MqttConfig;
  private unsubscribe: (() => void) | null = null;

  constructor(store: SimulationStore, client: TelemetryClient, config: MqttConfig = loadMqttConfig()) {
    this.store = store;
    this.client = client;
    this.config = config;
  }

  get statusTopic(): string {
    return buildTopic(this.config, TOPICS.STATUS);
  }

  get stopTopic(): string {
    return buildTopic(this.config, TOPICS.STOP);
  }

  start(): void {
    if (this.unsubscribe) return;

    const stopTopic = this.stopTopic;
    this.client.subscribe(stopTopic);
    this.client.onMessage((topic) => {
      if (topic !== stopTopic) return;
      devLog.info(`[MQTT] STOP received on ${topic}`);
      this.store.getState().close();
    });

    this.unsubscribe = this.store.subscribe((state, prevState) => {
      if (!state.snapshot || state.snapshot === prevState.snapshot) return;
      if (state.frames % this.config.PUBLISH_EVERY !== 0) return;
      this.client.publish(this.statusTopic, JSON.stringify(state.snapshot));
    });
  }

  stop(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
    this.client.end();
  }
}
