import { describe, it, expect } from "vitest";
import { parseCliArgs } from "./cli";
import type { RuntimeConfig } from "./config/runtime.config";

const BASE: RuntimeConfig = {
  MQTT_BROKER_URL: "mqtt://localhost:1883",
  MQTT_USERNAME: "",
  MQTT_PASSWORD: "",
  MQTT_NAMESPACE: "aquasmart",
  DEVICE_ID: "test_device_001",
  SENSOR_INTERVAL: 2000,
  SIMULATION_DURATION: 10,
  WOT_HTTP_PORT: 0,
  NOISE_SEED: undefined,
};

describe("parseCliArgs", () => {
  it("keeps the environment configuration without flags", () => {
    expect(parseCliArgs([], BASE)).toEqual({ config: BASE, scenario: false, help: false });
  });

  it("builds the broker URL from host and port", () => {
    const { config } = parseCliArgs(["--host", "broker.local", "--port", "1884"], BASE);
    expect(config.MQTT_BROKER_URL).toBe("mqtt://broker.local:1884");
  });

  it("applies device, timing and seed flags", () => {
    const { config, scenario } = parseCliArgs(
      ["--device", "unit-7", "--duration", "3", "--interval", "5", "--seed", "0", "--http-port", "8080", "--scenario"],
      BASE
    );
    expect(config).toMatchObject({
      DEVICE_ID: "unit-7",
      SIMULATION_DURATION: 3,
      SENSOR_INTERVAL: 5000,
      NOISE_SEED: 0,
      WOT_HTTP_PORT: 8080,
    });
    expect(scenario).toBe(true);
  });

  it("does not modify the base configuration", () => {
    parseCliArgs(["--device", "unit-7"], BASE);
    expect(BASE.DEVICE_ID).toBe("test_device_001");
  });

  it("rejects non-numeric and zero intervals", () => {
    expect(() => parseCliArgs(["--interval", "fast"], BASE)).toThrow(
      '--interval expects a positive integer, got "fast"'
    );
    expect(() => parseCliArgs(["--interval", "0"], BASE)).toThrow("--interval");
  });

  it("rejects unknown flags", () => {
    expect(() => parseCliArgs(["--broker", "x"], BASE)).toThrow();
  });

  it("recognises help", () => {
    expect(parseCliArgs(["-h"], BASE).help).toBe(true);
  });
});
