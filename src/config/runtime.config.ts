/**
 * Runtime Configuration
 *
 * Broker connection, device identity and timing of the simulator.
 * Every value can be set through an environment variable; command line
 * flags given to `main.ts` take precedence.
 *
 * Defaults:
 * - Sensor readings every 2 seconds for 10 minutes
 * - Broker at mqtt://localhost:1883, topics under "aquasmart/"
 * - Device HTTP surface disabled (WOT_HTTP_PORT=0)
 */

export const RUNTIME_CONFIG = {
  /**
   * MQTT broker URL (mqtt://, mqtts://, ws://)
   *
   * Set via environment variable: MQTT_BROKER_URL
   * Example: MQTT_BROKER_URL=mqtts://broker.example.org:8883 npm start
   */
  MQTT_BROKER_URL: process.env.MQTT_BROKER_URL || "mqtt://localhost:1883",

  MQTT_USERNAME: process.env.MQTT_USERNAME || "",
  MQTT_PASSWORD: process.env.MQTT_PASSWORD || "",

  /**
   * Topic namespace: `<ns>/sensors/<device>/data`, `<ns>/commands/filter`,
   * `<ns>/commands/<device>/response`
   */
  MQTT_NAMESPACE: process.env.MQTT_NAMESPACE || "aquasmart",

  DEVICE_ID: process.env.DEVICE_ID || "test_device_001",

  /**
   * Sensor reading interval (milliseconds)
   *
   * Set via environment variable: SENSOR_INTERVAL
   * Example: SENSOR_INTERVAL=5000 npm start
   */
  SENSOR_INTERVAL: parseInt(process.env.SENSOR_INTERVAL || "2000", 10),

  /**
   * Simulation duration (minutes)
   */
  SIMULATION_DURATION: parseInt(process.env.SIMULATION_DURATION || "10", 10),

  /**
   * Port of the device's Web of Things HTTP surface; 0 disables it
   */
  WOT_HTTP_PORT: parseInt(process.env.WOT_HTTP_PORT || "0", 10),

  /**
   * Seed for reproducible sensor noise; unset uses Math.random
   */
  NOISE_SEED: process.env.NOISE_SEED ? parseInt(process.env.NOISE_SEED, 10) : undefined,
};

export type RuntimeConfig = typeof RUNTIME_CONFIG;

// Log configuration on startup (helpful for debugging)
export function logConfiguration(config: RuntimeConfig = RUNTIME_CONFIG): void {
  console.log("\n📊 Simulator Configuration:");
  console.log(`   Broker:            ${config.MQTT_BROKER_URL}`);
  console.log(`   Namespace:         ${config.MQTT_NAMESPACE}`);
  console.log(`   Device ID:         ${config.DEVICE_ID}`);
  console.log(`   Sensor interval:   ${config.SENSOR_INTERVAL}ms`);
  console.log(`   Duration:          ${config.SIMULATION_DURATION} minutes`);
  console.log(`   HTTP port:         ${config.WOT_HTTP_PORT || "disabled"}`);
  console.log(`   Noise seed:        ${config.NOISE_SEED ?? "random"}\n`);
}
