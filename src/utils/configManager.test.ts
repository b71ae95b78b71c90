import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, afterEach } from "vitest";
import {
  ConfigError,
  DEFAULT_SIMULATOR_CONFIG,
  loadConfig,
  parseSimulatorConfig,
} from "./configManager";

describe("configManager", () => {
  const tempDirs: string[] = [];

  const writeConfig = (content: string): string => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "filtration-config-"));
    tempDirs.push(dir);
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, content);
    return file;
  };

  afterEach(() => {
    tempDirs.splice(0).forEach((dir) => fs.rmSync(dir, { recursive: true, force: true }));
  });

  it("falls back to the defaults for an empty document", () => {
    expect(parseSimulatorConfig({})).toEqual(DEFAULT_SIMULATOR_CONFIG);
  });

  it("defaults to 50 L drinking water and 75 L household water runs", () => {
    expect(DEFAULT_SIMULATOR_CONFIG.modes.drinking_water.targetVolume).toBe(50.0);
    expect(DEFAULT_SIMULATOR_CONFIG.modes.household_water.targetVolume).toBe(75.0);
    expect(DEFAULT_SIMULATOR_CONFIG.settlingDelayMs).toBe(2000);
    expect(DEFAULT_SIMULATOR_CONFIG.readingMinutes).toBe(0.5);
  });

  it("merges partial sections over the defaults", () => {
    const config = parseSimulatorConfig({
      defaultMode: "household_water",
      sensor: { baseFlow: 3.0 },
      modes: { household_water: { ph: { spread: 0.2 } } },
    });

    expect(config.defaultMode).toBe("household_water");
    expect(config.sensor).toEqual({ baseFlow: 3.0, baseTurbidity: 1.2, baseTds: 280.0 });
    expect(config.modes.household_water).toEqual({
      targetVolume: 75.0,
      ph: { center: 7.5, spread: 0.2 },
    });
    expect(config.modes.drinking_water).toEqual(DEFAULT_SIMULATOR_CONFIG.modes.drinking_water);
  });

  it("rejects invalid values with the offending key", () => {
    expect(() => parseSimulatorConfig({ sensor: { baseTds: -1 } })).toThrow(
      new ConfigError("config.sensor.baseTds must be a non-negative number")
    );
    expect(() => parseSimulatorConfig({ modes: { drinking_water: { targetVolume: "50" } } })).toThrow(
      "config.modes.drinking_water.targetVolume must be a non-negative number"
    );
    expect(() => parseSimulatorConfig({ defaultMode: "pool_water" })).toThrow(
      "config.defaultMode is not a filtration mode: pool_water"
    );
    expect(() => parseSimulatorConfig({ sensor: [] })).toThrow("config.sensor must be an object");
    expect(() => parseSimulatorConfig("config")).toThrow(ConfigError);
  });

  it("loads a config file", () => {
    const file = writeConfig(JSON.stringify({ settlingDelayMs: 500, readingMinutes: 1 }));
    const config = loadConfig(file);
    expect(config.settlingDelayMs).toBe(500);
    expect(config.readingMinutes).toBe(1);
  });

  it("uses the defaults when the file is missing", () => {
    expect(loadConfig(path.join(os.tmpdir(), "does-not-exist", "config.json"))).toBe(
      DEFAULT_SIMULATOR_CONFIG
    );
  });

  it("reports a file that is not JSON", () => {
    const file = writeConfig("{ broken");
    expect(() => loadConfig(file)).toThrow(ConfigError);
  });

  it("accepts the repository config.json", () => {
    expect(loadConfig(path.join(__dirname, "..", "..", "config.json"))).toEqual(DEFAULT_SIMULATOR_CONFIG);
  });
});
