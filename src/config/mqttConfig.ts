// MQTT Configuration Types
// Topic format: {PREFIX}/simulation/{SERVICE}
// Example: SIGNALSIM/simulation/STATUS

import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { ConfigLoadError } from "@/common/errors";
import { devLog } from "@/logger";

export interface MqttConfig {
  MQTT_BROKER_URL: string;
  TOPIC_PREFIX: string;
  /** Publish at most every N-th snapshot */
  PUBLISH_EVERY: number;
}

// Service types for topic routing
export const TOPICS = {
  // Status
  STATUS: "STATUS",
  // Commands
  STOP: "STOP",
} as const;

export type TopicService = (typeof TOPICS)[keyof typeof TOPICS];

// Default configuration (fallback)
export const defaultMqttConfig: MqttConfig = {
  MQTT_BROKER_URL: "mqtt://localhost:1883",
  TOPIC_PREFIX: "SIGNALSIM",
  PUBLISH_EVERY: 1,
};

export const DEFAULT_MQTT_CONFIG_PATH = fileURLToPath(
  new URL("../../public/config/mqttConfig.json", import.meta.url)
);

export const buildTopic = (config: MqttConfig, service: TopicService): string =>
  `${config.TOPIC_PREFIX}/simulation/${service}`;

// Load MQTT configuration from JSON file
export const loadMqttConfig = (path: string = DEFAULT_MQTT_CONFIG_PATH): MqttConfig => {
  if (!existsSync(path)) {
    devLog.warn(`${path} not found, using defaults`);
    return defaultMqttConfig;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigLoadError(path, error instanceof Error ? error.message : String(error));
  }
  if (parsed === null || typeof parsed !== "object") {
    throw new ConfigLoadError(path, "expected a JSON object");
  }

  const url = "MQTT_BROKER_URL" in parsed ? parsed.MQTT_BROKER_URL : undefined;
  const prefix = "TOPIC_PREFIX" in parsed ? parsed.TOPIC_PREFIX : undefined;
  const every = "PUBLISH_EVERY" in parsed ? parsed.PUBLISH_EVERY : undefined;

  return {
    MQTT_BROKER_URL: typeof url === "string" ? url : defaultMqttConfig.MQTT_BROKER_URL,
    TOPIC_PREFIX: typeof prefix === "string" ? prefix : defaultMqttConfig.TOPIC_PREFIX,
    PUBLISH_EVERY:
      typeof every === "number" && every >= 1 ? Math.floor(every) : defaultMqttConfig.PUBLISH_EVERY,
  };
};
