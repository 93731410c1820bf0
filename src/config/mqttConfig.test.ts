import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigLoadError } from "@/common/errors";
import { DevLogger } from "@/logger";
import { TOPICS, buildTopic, defaultMqttConfig, loadMqttConfig } from "./mqttConfig";

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "mqtt-config-"));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("mqttConfig", () => {
  it("builds prefixed topics", () => {
    expect(buildTopic(defaultMqttConfig, TOPICS.STATUS)).toBe("SIGNALSIM/simulation/STATUS");
  });

  it("loads the shipped file", () => {
    const config = loadMqttConfig();
    expect(config.TOPIC_PREFIX).toBe("SIGNALSIM");
    expect(config.PUBLISH_EVERY).toBe(10);
  });

  it("falls back to defaults and logs a warning when the file is missing", () => {
    const warn = vi.spyOn(DevLogger, "warn").mockImplementation(() => {});
    const path = join(dir, "missing.json");

    expect(loadMqttConfig(path)).toEqual(defaultMqttConfig);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe(`${path} not found, using defaults`);
    warn.mockRestore();
  });

  it("fills missing or invalid fields", () => {
    const path = join(dir, "partial.json");
    writeFileSync(path, JSON.stringify({ TOPIC_PREFIX: "LAB", PUBLISH_EVERY: 2.7 }));
    expect(loadMqttConfig(path)).toEqual({
      MQTT_BROKER_URL: "mqtt://localhost:1883",
      TOPIC_PREFIX: "LAB",
      PUBLISH_EVERY: 2,
    });

    writeFileSync(path, JSON.stringify({ PUBLISH_EVERY: 0 }));
    expect(loadMqttConfig(path).PUBLISH_EVERY).toBe(1);
  });

  it("rejects malformed files", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "[");
    expect(() => loadMqttConfig(path)).toThrow(ConfigLoadError);

    writeFileSync(path, "42");
    expect(() => loadMqttConfig(path)).toThrow("expected a JSON object");
  });
});
