import { CommandProtocol, decodeCommand } from "../protocol/CommandProtocol";
import { FiltrationProcess } from "../simulation/FiltrationProcess";
import { SensorModel } from "../simulation/SensorModel";
import type { NoiseSource } from "../simulation/noise";
import { deviceTopics, DeviceTopics } from "../transport/topics";
import type { Transport } from "../transport/Transport";
import {
  CommandResponse,
  FiltrationMode,
  SET_FILTER_MODE,
  SensorPayload,
  SensorReading,
} from "../types/FiltrationTypes";
import type { SimulatorConfig } from "../utils/configManager";
import { logEvent } from "../utils/eventLog";

export interface FiltrationSimulatorOptions {
  deviceId: string;
  namespace?: string;
  transport: Transport;
  config: SimulatorConfig;
  noise: NoiseSource;
  /** Milliseconds between two readings */
  intervalMs: number;
  /** Epoch milliseconds for run start times. Defaults to `Date.now`. */
  now?: () => number;
  /** Waits out the mode settling delay. Defaults to a timer. */
  settle?: (ms: number) => Promise<void>;
}

export type ReadingListener = (reading: SensorReading) => void;
export type ModeChangeListener = (mode: FiltrationMode) => void;

export function toSensorPayload(reading: SensorReading): SensorPayload {
  const payload: SensorPayload = {
    flow: reading.flow,
    ph: reading.ph,
    turbidity: reading.turbidity,
    tds: reading.tds,
  };
  if (reading.progress) {
    payload._meta = {
      filtration_active: true,
      processed_volume: reading.progress.processedVolume,
      target_volume: reading.progress.targetVolume,
      progress: reading.progress.progressPercent,
      elapsed_minutes: reading.progress.elapsedMinutes,
    };
  }
  return payload;
}

/**
 * FiltrationSimulator - one simulated filtration device.
 *
 * Publishes a sensor reading every `intervalMs` and applies filter mode
 * commands received on the shared command topic. Both activities act on the
 * same FiltrationProcess; each reading is generated in a single synchronous
 * step, and a command only mutates the process after its settling delay.
 */
export class FiltrationSimulator {
  public readonly deviceId: string;
  public readonly topics: DeviceTopics;
  public readonly process: FiltrationProcess;
  public readonly protocol: CommandProtocol;

  private readonly transport: Transport;
  private readonly sensorModel: SensorModel;
  private readonly config: SimulatorConfig;
  private readonly intervalMs: number;

  private tickTimer: NodeJS.Timeout | null = null;
  private runTimer: NodeJS.Timeout | null = null;
  private finishRun: (() => void) | null = null;
  private stopped = false;
  private latestReading: SensorReading | null = null;
  private readonly readingListeners: ReadingListener[] = [];
  private readonly modeListeners: ModeChangeListener[] = [];

  constructor(options: FiltrationSimulatorOptions) {
    this.deviceId = options.deviceId;
    this.topics = deviceTopics(options.deviceId, options.namespace);
    this.transport = options.transport;
    this.config = options.config;
    this.intervalMs = options.intervalMs;

    this.process = new FiltrationProcess({
      mode: options.config.defaultMode,
      targetVolumes: {
        drinking_water: options.config.modes.drinking_water.targetVolume,
        household_water: options.config.modes.household_water.targetVolume,
      },
      now: options.now,
    });

    this.sensorModel = new SensorModel({
      sensor: options.config.sensor,
      phBands: {
        drinking_water: options.config.modes.drinking_water.ph,
        household_water: options.config.modes.household_water.ph,
      },
      noise: options.noise,
      readingMinutes: options.config.readingMinutes,
    });

    this.protocol = new CommandProtocol(this.process, {
      settlingDelayMs: options.config.settlingDelayMs,
      delay: options.settle,
      onModeChanged: (mode) => {
        this.logRunStart();
        this.modeListeners.forEach((listener) => listener(mode));
      },
      isCancelled: () => this.stopped,
    });
  }

  /**
   * Subscribe to the command topic.
   */
  public async connect(): Promise<void> {
    await this.transport.subscribe(this.topics.filterCommand, async (payload) => {
      await this.handleMessage(payload);
    });
  }

  public onReading(listener: ReadingListener): void {
    this.readingListeners.push(listener);
  }

  public onModeChange(listener: ModeChangeListener): void {
    this.modeListeners.push(listener);
  }

  public getLatestReading(): SensorReading | null {
    return this.latestReading;
  }

  public isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Start a run in the configured default mode, as the device does on boot.
   */
  public startDefaultRun(): void {
    logEvent(`🔄 [Simulator] Auto-starting initial filtration process in ${this.config.defaultMode} mode`);
    this.process.start(this.config.defaultMode);
    this.logRunStart();
  }

  /**
   * Generate one reading, advance the run by it, and publish it.
   * @returns the reading, or null once the simulator is stopped
   */
  public async publishReading(): Promise<SensorReading | null> {
    if (this.stopped) return null;

    const wasActive = this.process.isActive();
    const reading = this.sensorModel.generate(this.process);
    this.latestReading = reading;

    if (wasActive && !this.process.isActive()) {
      logEvent(
        `🎉 [Simulator] Filtration completed! Processed ${this.process.snapshot().processedVolume}L`
      );
    }
    this.logReading(reading);
    this.readingListeners.forEach((listener) => listener(reading));

    await this.transport.publish(this.topics.sensorData, JSON.stringify(toSensorPayload(reading)));
    return reading;
  }

  /**
   * Auto-start the default run and publish readings every `intervalMs` until
   * `durationMs` elapses or `stop()` is called.
   */
  public run(durationMs: number): Promise<void> {
    if (this.stopped) return Promise.resolve();

    logEvent(`🚀 [Simulator] Starting filtration simulation for ${durationMs / 60000} minutes`);
    logEvent(`📡 [Simulator] Publishing to topic: ${this.topics.sensorData}`);
    this.startDefaultRun();

    return new Promise<void>((resolve) => {
      this.finishRun = resolve;
      this.tick();
      this.tickTimer = setInterval(() => this.tick(), this.intervalMs);
      this.runTimer = setTimeout(() => {
        logEvent(`⏹️  [Simulator] Simulation completed after ${durationMs / 60000} minutes`);
        this.stop();
      }, durationMs);
    });
  }

  /**
   * Stop ticking and ignore later commands. Pending ticks are abandoned, and
   * a mode switch still settling is dropped without its success response.
   */
  public stop(): void {
    this.stopped = true;
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    if (this.runTimer) {
      clearTimeout(this.runTimer);
      this.runTimer = null;
    }
    const finish = this.finishRun;
    this.finishRun = null;
    finish?.();
  }

  /**
   * Handle one raw payload from the command topic.
   */
  public async handleMessage(payload: Buffer): Promise<CommandResponse[]> {
    if (this.stopped) return [];

    const command = decodeCommand(payload);
    if (!command) {
      logEvent(`[Simulator] Dropped malformed command: ${payload.toString()}`, "DEBUG");
      return [];
    }
    if (command.kind !== SET_FILTER_MODE) {
      logEvent(`[Simulator] Ignoring unsupported command: ${command.command}`, "DEBUG");
      return [];
    }

    logEvent(`📨 [Simulator] Received command: ${payload.toString()}`);
    return this.protocol.handleCommand(command, (response) => this.publishResponse(response));
  }

  /**
   * Request a mode switch outside the command topic (the device's HTTP surface).
   * Responses are still published on the response topic.
   */
  public setFilterMode(mode: unknown): Promise<CommandResponse[]> {
    return this.protocol.handleCommand({ kind: SET_FILTER_MODE, mode }, (response) =>
      this.publishResponse(response)
    );
  }

  private async publishResponse(response: CommandResponse): Promise<void> {
    logEvent(
      `${response.status === "error" ? "❌" : "🔄"} [Simulator] ${response.status}: ${response.message}`,
      response.status === "error" ? "WARN" : "INFO"
    );
    await this.transport.publish(this.topics.commandResponse, JSON.stringify(response));
  }

  private tick(): void {
    this.publishReading().catch((error: unknown) =>
      logEvent(`[Simulator] Failed to publish sensor data: ${String(error)}`, "ERROR")
    );
  }

  private logRunStart(): void {
    const state = this.process.snapshot();
    logEvent(
      `🚰 [Simulator] Starting filtration process: ${state.mode} mode, target: ${state.targetVolume}L`
    );
  }

  private logReading(reading: SensorReading): void {
    const state = this.process.snapshot();
    if (reading.progress) {
      logEvent(
        `📊 [Simulator] Mode: ${state.mode}, Progress: ${reading.progress.progressPercent.toFixed(1)}%, ` +
          `Volume: ${state.processedVolume.toFixed(1)}L/${state.targetVolume}L, Flow: ${reading.flow}L/min`
      );
    } else {
      logEvent(
        `🔬 [Simulator] Sensor data: pH=${reading.ph}, Flow=${reading.flow}L/min, ` +
          `Turbidity=${reading.turbidity}NTU, TDS=${reading.tds}ppm`
      );
    }
  }
}
