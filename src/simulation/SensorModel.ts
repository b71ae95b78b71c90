import type { FiltrationMode, SensorReading } from "../types/FiltrationTypes";
import type { PhBand, SensorBaselines } from "../utils/configManager";
import type { FiltrationProcess } from "./FiltrationProcess";
import type { NoiseSource } from "./noise";

export interface SensorModelOptions {
  sensor: SensorBaselines;
  phBands: Record<FiltrationMode, PhBand>;
  noise: NoiseSource;
  /** Simulated minutes of filtration per reading */
  readingMinutes: number;
}

/** Flow degrades by up to this share as the filter loads. */
const FLOW_DEGRADATION = 0.3;
const TURBIDITY_IMPROVEMENT = 0.7;
const TDS_IMPROVEMENT = 0.4;
/** Residual trickle of an active run */
const MIN_ACTIVE_FLOW = 0.5;

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/**
 * SensorModel - derives flow, pH, turbidity and TDS from the progress of
 * the current filtration run.
 *
 * `generate()` both reads and advances the process: the flow it reports is
 * the same full-precision flow used to account processed volume, so
 * progress can be reconstructed from the reading stream.
 */
export class SensorModel {
  private readonly options: SensorModelOptions;

  constructor(options: SensorModelOptions) {
    this.options = options;
  }

  public get readingMinutes(): number {
    return this.options.readingMinutes;
  }

  public generate(process: FiltrationProcess): SensorReading {
    const { sensor, phBands, noise, readingMinutes } = this.options;

    let flow: number;
    if (process.isActive()) {
      const ratio = process.progressRatio();
      flow = sensor.baseFlow * (1 - FLOW_DEGRADATION * ratio) + noise.uniform(-0.2, 0.2);
      flow = Math.max(MIN_ACTIVE_FLOW, flow);
      process.tick(readingMinutes, flow);
    } else {
      flow = noise.uniform(0.0, 0.1);
    }

    const band = phBands[process.getMode()];
    const targetPh = band.center + noise.uniform(-band.spread, band.spread);
    const ph = targetPh + noise.uniform(-0.1, 0.1);

    // Water quality follows the state after this reading's volume is counted
    let turbidity: number;
    let tds: number;
    if (process.isActive()) {
      const ratio = process.progressRatio();
      turbidity =
        sensor.baseTurbidity * (1 - TURBIDITY_IMPROVEMENT * ratio) + noise.uniform(-0.1, 0.1);
      tds = sensor.baseTds * (1 - TDS_IMPROVEMENT * ratio) + noise.uniform(-10, 10);
    } else {
      turbidity = sensor.baseTurbidity + noise.uniform(-0.2, 0.2);
      tds = sensor.baseTds + noise.uniform(-15, 15);
    }

    const reading: SensorReading = {
      flow: Math.max(0, round(flow, 2)),
      ph: Math.max(0, round(ph, 2)),
      turbidity: Math.max(0, round(turbidity, 2)),
      tds: Math.max(0, round(tds, 1)),
    };

    if (process.isActive()) {
      const state = process.snapshot();
      reading.progress = {
        processedVolume: round(state.processedVolume, 2),
        targetVolume: state.targetVolume,
        progressPercent: round(process.progressRatio() * 100, 1),
        elapsedMinutes: round(process.elapsedMinutes(), 1),
      };
    }

    return reading;
  }
}
