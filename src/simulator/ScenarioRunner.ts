import type { FiltrationMode } from "../types/FiltrationTypes";
import { logEvent } from "../utils/eventLog";
import type { FiltrationSimulator } from "./FiltrationSimulator";

export interface FiltrationScenario {
  name: string;
  mode: FiltrationMode;
  targetVolume: number;
  /** Reading budget of the scenario, in minutes of reading intervals */
  durationMinutes: number;
}

export interface ScenarioResult {
  name: string;
  /** The run reached its target volume within the budget */
  completed: boolean;
  readings: number;
  processedVolume: number;
}

export interface ScenarioRunnerOptions {
  /** Milliseconds between readings (default 1000) */
  intervalMs?: number;
  /** Pause between scenarios (default 2000) */
  pauseMs?: number;
  /** Waits between readings; should resolve early once `signal` aborts. */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

const abortableSleep = (ms: number, signal: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

export const DEFAULT_SCENARIOS: readonly FiltrationScenario[] = [
  { name: "Quick Drinking Water Cycle", mode: "drinking_water", targetVolume: 20.0, durationMinutes: 3 },
  { name: "Household Water Full Cycle", mode: "household_water", targetVolume: 40.0, durationMinutes: 5 },
  { name: "High Volume Processing", mode: "drinking_water", targetVolume: 100.0, durationMinutes: 8 },
];

/**
 * ScenarioRunner - replays fixed filtration runs through a simulator.
 *
 * Readings go through `FiltrationSimulator.publishReading()`, the path live
 * ticking uses, so a replay exercises the same state transitions.
 */
export class ScenarioRunner {
  private readonly simulator: FiltrationSimulator;
  private readonly intervalMs: number;
  private readonly pauseMs: number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly abort = new AbortController();

  private stopped = false;
  private wakeUp: (() => void) | null = null;

  constructor(simulator: FiltrationSimulator, options: ScenarioRunnerOptions = {}) {
    this.simulator = simulator;
    this.intervalMs = options.intervalMs ?? 1000;
    this.pauseMs = options.pauseMs ?? 2000;
    this.sleep = options.sleep ?? abortableSleep;
  }

  public async runAll(
    scenarios: readonly FiltrationScenario[] = DEFAULT_SCENARIOS
  ): Promise<ScenarioResult[]> {
    logEvent("🧪 [Scenario] Running Filtration Test Scenarios");
    const results: ScenarioResult[] = [];

    for (const [index, scenario] of scenarios.entries()) {
      if (this.stopped) break;
      logEvent(
        `📋 [Scenario] ${index + 1}: ${scenario.name} | Mode: ${scenario.mode} | ` +
          `Target: ${scenario.targetVolume}L | Duration: ${scenario.durationMinutes} minutes`
      );

      const result = await this.runScenario(scenario);
      results.push(result);
      logEvent(`   📊 [Scenario] Final volume processed: ${result.processedVolume.toFixed(1)}L`);

      if (index < scenarios.length - 1) {
        await this.pause(this.pauseMs);
      }
    }
    return results;
  }

  public async runScenario(scenario: FiltrationScenario): Promise<ScenarioResult> {
    const budget = Math.ceil((scenario.durationMinutes * 60000) / this.intervalMs);
    this.simulator.process.start(scenario.mode, scenario.targetVolume);

    let readings = 0;
    let completed = false;
    while (!this.stopped && readings < budget) {
      const reading = await this.simulator.publishReading();
      if (!reading) break;
      readings += 1;

      if (!this.simulator.process.isActive()) {
        completed = true;
        logEvent("   ✅ [Scenario] Scenario completed early (filtration finished)");
        break;
      }
      await this.pause(this.intervalMs);
    }

    return {
      name: scenario.name,
      completed,
      readings,
      processedVolume: this.simulator.process.snapshot().processedVolume,
    };
  }

  /**
   * Abandon the scenario in progress; no further readings are published.
   */
  public stop(): void {
    this.stopped = true;
    this.abort.abort();
    const wake = this.wakeUp;
    this.wakeUp = null;
    wake?.();
  }

  private pause(ms: number): Promise<void> {
    if (this.stopped) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      this.wakeUp = resolve;
      this.sleep(ms, this.abort.signal).then(() => {
        this.wakeUp = null;
        resolve();
      }, reject);
    });
  }
}
