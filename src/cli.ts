import { parseArgs } from "util";
import type { RuntimeConfig } from "./config/runtime.config";

export interface CliOptions {
  config: RuntimeConfig;
  /** Replay the fixed scenario list instead of a live run */
  scenario: boolean;
  help: boolean;
}

export const USAGE = `Usage: filtration-simulator [options]

  --host <host>        MQTT broker host (default from MQTT_BROKER_URL)
  --port <port>        MQTT broker port
  --device <id>        Device ID
  --namespace <ns>     Topic namespace
  --duration <min>     Simulation duration in minutes
  --interval <sec>     Sensor data interval in seconds
  --seed <n>           Seed for reproducible sensor noise
  --http-port <port>   Expose the device over HTTP on this port (0 disables)
  --scenario           Run predefined test scenarios
  -h, --help           Show this help`;

function positiveInt(flag: string, raw: string, allowZero = false): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || (!allowZero && value === 0)) {
    throw new Error(`--${flag} expects a ${allowZero ? "non-negative" : "positive"} integer, got "${raw}"`);
  }
  return value;
}

/**
 * Apply command line flags over the environment configuration.
 */
export function parseCliArgs(args: string[], base: RuntimeConfig): CliOptions {
  const { values } = parseArgs({
    args,
    options: {
      host: { type: "string" },
      port: { type: "string" },
      device: { type: "string" },
      namespace: { type: "string" },
      duration: { type: "string" },
      interval: { type: "string" },
      seed: { type: "string" },
      "http-port": { type: "string" },
      scenario: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  const config: RuntimeConfig = { ...base };

  if (values.host !== undefined || values.port !== undefined) {
    const url = new URL(base.MQTT_BROKER_URL);
    if (values.host !== undefined) url.hostname = values.host;
    if (values.port !== undefined) url.port = String(positiveInt("port", values.port));
    config.MQTT_BROKER_URL = url.toString().replace(/\/$/, "");
  }
  if (values.device !== undefined) config.DEVICE_ID = values.device;
  if (values.namespace !== undefined) config.MQTT_NAMESPACE = values.namespace;
  if (values.duration !== undefined) {
    config.SIMULATION_DURATION = positiveInt("duration", values.duration);
  }
  if (values.interval !== undefined) {
    config.SENSOR_INTERVAL = positiveInt("interval", values.interval) * 1000;
  }
  if (values.seed !== undefined) {
    config.NOISE_SEED = positiveInt("seed", values.seed, true);
  }
  if (values["http-port"] !== undefined) {
    config.WOT_HTTP_PORT = positiveInt("http-port", values["http-port"], true);
  }

  return {
    config,
    scenario: values.scenario === true,
    help: values.help === true,
  };
}
