import type {
  FiltrationMode,
  FiltrationSnapshot,
} from "../types/FiltrationTypes";

export class FiltrationInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FiltrationInvariantError";
  }
}

export interface FiltrationProcessOptions {
  /** Initial mode; the process starts Idle in it. */
  mode: FiltrationMode;
  /** Default target volume (L) of a run per mode. */
  targetVolumes: Record<FiltrationMode, number>;
  /** Epoch milliseconds. Defaults to `Date.now`. */
  now?: () => number;
}

/**
 * FiltrationProcess - state of one filtration run on a simulated device.
 *
 * Idle → start() → Active → tick() reaches target → Idle, repeatable.
 * Every mutation happens inside a single synchronous call, so a reader on
 * the event loop never sees a run whose mode and volumes disagree.
 */
export class FiltrationProcess {
  private mode: FiltrationMode;
  private active: boolean = false;
  private startedAt: number | null = null;
  private targetVolume: number;
  protected processedVolume: number = 0;

  private readonly targetVolumes: Record<FiltrationMode, number>;
  private readonly now: () => number;

  constructor(options: FiltrationProcessOptions) {
    this.mode = options.mode;
    this.targetVolumes = { ...options.targetVolumes };
    this.targetVolume = this.targetVolumes[options.mode];
    this.now = options.now ?? Date.now;
  }

  /**
   * Begin a new run in `mode`, discarding any run in progress.
   * @param targetOverride explicit target volume (scenario replays)
   */
  public start(mode: FiltrationMode, targetOverride?: number): void {
    const target = targetOverride ?? this.targetVolumes[mode];
    if (!Number.isFinite(target) || target < 0) {
      throw new RangeError(`Target volume must be a non-negative number, got ${target}`);
    }

    this.mode = mode;
    this.targetVolume = target;
    this.processedVolume = 0;
    this.startedAt = this.now();
    this.active = true;
  }

  /**
   * Account `flowRate × elapsedMinutes` litres to the active run.
   * No-op while Idle.
   * @returns true when this tick completed the run
   */
  public tick(elapsedMinutes: number, flowRate: number): boolean {
    if (!(elapsedMinutes >= 0) || !(flowRate >= 0)) {
      throw new RangeError(
        `tick requires non-negative inputs (elapsed=${elapsedMinutes}, flow=${flowRate})`
      );
    }
    if (!this.active) {
      return false;
    }
    if (this.processedVolume > this.targetVolume) {
      throw new FiltrationInvariantError(
        `processed volume ${this.processedVolume} exceeds target ${this.targetVolume}`
      );
    }

    const next = this.processedVolume + flowRate * elapsedMinutes;
    if (next >= this.targetVolume) {
      this.processedVolume = this.targetVolume;
      this.active = false;
      return true;
    }
    this.processedVolume = next;
    return false;
  }

  public snapshot(): FiltrationSnapshot {
    return {
      mode: this.mode,
      active: this.active,
      startedAt: this.startedAt,
      targetVolume: this.targetVolume,
      processedVolume: this.processedVolume,
    };
  }

  public isActive(): boolean {
    return this.active;
  }

  public getMode(): FiltrationMode {
    return this.mode;
  }

  /** `processedVolume / targetVolume`, 0 for an empty target. */
  public progressRatio(): number {
    return this.targetVolume > 0 ? this.processedVolume / this.targetVolume : 0;
  }

  public elapsedMinutes(): number {
    if (this.startedAt === null) return 0;
    return Math.max(0, this.now() - this.startedAt) / 60000;
  }
}
