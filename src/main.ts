#!/usr/bin/env node
import * as path from "path";

import { parseCliArgs, USAGE } from "./cli";
import { RUNTIME_CONFIG, logConfiguration } from "./config/runtime.config";
import { createSeededNoise, mathRandomNoise } from "./simulation/noise";
import { FiltrationSimulator } from "./simulator/FiltrationSimulator";
import { ScenarioRunner } from "./simulator/ScenarioRunner";
import { FiltrationDeviceThing } from "./things/FiltrationDeviceThing";
import { MqttTransport } from "./transport/MqttTransport";
import { loadConfig } from "./utils/configManager";
import { logEvent } from "./utils/eventLog";
import { createWoTRuntimeAsync, getTDFromFile, WoTRuntimeHandle } from "./utils/wotRuntime";

// ====================================
// FILTRATION DEVICE SIMULATOR
// ====================================
// Sensor telemetry  → <ns>/sensors/<device>/data
// Filter commands   ← <ns>/commands/filter
// Command responses → <ns>/commands/<device>/response
// ====================================

(async function main() {
  const options = parseCliArgs(process.argv.slice(2), RUNTIME_CONFIG);
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const config = options.config;
  console.log("🌊 Filtration Device MQTT Simulator");
  logConfiguration(config);

  const simulatorConfig = loadConfig();

  const transport = await MqttTransport.connect({
    brokerUrl: config.MQTT_BROKER_URL,
    clientId: `filtration_simulator_${config.DEVICE_ID}`,
    username: config.MQTT_USERNAME,
    password: config.MQTT_PASSWORD,
  });

  const simulator = new FiltrationSimulator({
    deviceId: config.DEVICE_ID,
    namespace: config.MQTT_NAMESPACE,
    transport,
    config: simulatorConfig,
    noise: config.NOISE_SEED !== undefined ? createSeededNoise(config.NOISE_SEED) : mathRandomNoise,
    intervalMs: config.SENSOR_INTERVAL,
  });
  await simulator.connect();

  let wotRuntime: WoTRuntimeHandle | null = null;
  let deviceThing: FiltrationDeviceThing | null = null;
  if (config.WOT_HTTP_PORT > 0) {
    wotRuntime = await createWoTRuntimeAsync(config.WOT_HTTP_PORT);
    const td = getTDFromFile(path.join(__dirname, "..", "models", "filtration-device.tm.json"));
    deviceThing = new FiltrationDeviceThing(wotRuntime.wot, td, simulator);
    await deviceThing.startAsync();
    logEvent(`🌐 Device HTTP surface: http://localhost:${config.WOT_HTTP_PORT}/${deviceThing.title.toLowerCase()}`);
  }

  const runner = options.scenario ? new ScenarioRunner(simulator) : null;

  let closing: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (!closing) {
      closing = (async () => {
        runner?.stop();
        simulator.stop();
        await deviceThing?.stopAsync();
        await wotRuntime?.shutdown();
        await transport.close();
      })();
    }
    return closing;
  };

  const onSignal = (signal: NodeJS.Signals) => {
    logEvent(`⏹️  Simulation stopped by user (${signal})`);
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        logEvent(`Shutdown failed: ${String(error)}`, "ERROR");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  if (runner) {
    const results = await runner.runAll();
    for (const result of results) {
      logEvent(
        `   ${result.completed ? "✅" : "⏱️"} ${result.name}: ${result.processedVolume.toFixed(1)}L in ${result.readings} readings`
      );
    }
  } else {
    await simulator.run(config.SIMULATION_DURATION * 60000);
  }

  await shutdown();
})().catch((error: unknown) => {
  logEvent(`❌ Simulator failed: ${error instanceof Error ? error.message : String(error)}`, "ERROR");
  process.exit(1);
});
