import * as fs from "fs";
import * as path from "path";
import { FiltrationMode, isFiltrationMode } from "../types/FiltrationTypes";

export interface PhBand {
  center: number;
  spread: number;
}

export interface ModeProfile {
  targetVolume: number;
  ph: PhBand;
}

export interface SensorBaselines {
  /** L/min */
  baseFlow: number;
  /** NTU */
  baseTurbidity: number;
  /** ppm */
  baseTds: number;
}

export interface SimulatorConfig {
  defaultMode: FiltrationMode;
  sensor: SensorBaselines;
  modes: Record<FiltrationMode, ModeProfile>;
  /** Simulated minutes of filtration accounted to each reading */
  readingMinutes: number;
  /** Time a mode switch takes before the new run starts */
  settlingDelayMs: number;
}

export const DEFAULT_SIMULATOR_CONFIG: SimulatorConfig = {
  defaultMode: "drinking_water",
  sensor: {
    baseFlow: 2.5,
    baseTurbidity: 1.2,
    baseTds: 280.0,
  },
  modes: {
    drinking_water: { targetVolume: 50.0, ph: { center: 7.0, spread: 0.3 } },
    household_water: { targetVolume: 75.0, ph: { center: 7.5, spread: 0.5 } },
  },
  readingMinutes: 0.5,
  settlingDelayMs: 2000,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function readNumber(
  source: Record<string, unknown>,
  key: string,
  fallback: number,
  at: string
): number {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${at}.${key} must be a non-negative number`);
  }
  return value;
}

function section(
  source: Record<string, unknown>,
  key: string,
  at: string
): Record<string, unknown> {
  const value = source[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`${at}.${key} must be an object`);
  }
  return value;
}

function parseModeProfile(
  raw: Record<string, unknown>,
  fallback: ModeProfile,
  at: string
): ModeProfile {
  const ph = section(raw, "ph", at);
  return {
    targetVolume: readNumber(raw, "targetVolume", fallback.targetVolume, at),
    ph: {
      center: readNumber(ph, "center", fallback.ph.center, `${at}.ph`),
      spread: readNumber(ph, "spread", fallback.ph.spread, `${at}.ph`),
    },
  };
}

/**
 * Merge a parsed `config.json` document over the defaults.
 * Unknown keys are ignored; present keys must hold valid values.
 */
export function parseSimulatorConfig(raw: unknown): SimulatorConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("config must be a JSON object");
  }
  const defaults = DEFAULT_SIMULATOR_CONFIG;

  const defaultMode = raw.defaultMode ?? defaults.defaultMode;
  if (!isFiltrationMode(defaultMode)) {
    throw new ConfigError(`config.defaultMode is not a filtration mode: ${String(defaultMode)}`);
  }

  const sensor = section(raw, "sensor", "config");
  const modes = section(raw, "modes", "config");

  return {
    defaultMode,
    sensor: {
      baseFlow: readNumber(sensor, "baseFlow", defaults.sensor.baseFlow, "config.sensor"),
      baseTurbidity: readNumber(sensor, "baseTurbidity", defaults.sensor.baseTurbidity, "config.sensor"),
      baseTds: readNumber(sensor, "baseTds", defaults.sensor.baseTds, "config.sensor"),
    },
    modes: {
      drinking_water: parseModeProfile(
        section(modes, "drinking_water", "config.modes"),
        defaults.modes.drinking_water,
        "config.modes.drinking_water"
      ),
      household_water: parseModeProfile(
        section(modes, "household_water", "config.modes"),
        defaults.modes.household_water,
        "config.modes.household_water"
      ),
    },
    readingMinutes: readNumber(raw, "readingMinutes", defaults.readingMinutes, "config"),
    settlingDelayMs: readNumber(raw, "settlingDelayMs", defaults.settlingDelayMs, "config"),
  };
}

/**
 * Load the simulator configuration from `config.json` in the working directory.
 * A missing file yields the defaults.
 */
export function loadConfig(
  configPath: string = path.join(process.cwd(), "config.json")
): SimulatorConfig {
  if (!fs.existsSync(configPath)) {
    return DEFAULT_SIMULATOR_CONFIG;
  }
  const configContent = fs.readFileSync(configPath, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(configContent);
  } catch (error) {
    throw new ConfigError(
      `${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseSimulatorConfig(raw);
}
