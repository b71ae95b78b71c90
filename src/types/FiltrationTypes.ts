/**
 * Shared types for the filtration device simulator
 */

export const FILTRATION_MODES = ["drinking_water", "household_water"] as const;

export type FiltrationMode = (typeof FILTRATION_MODES)[number];

export function isFiltrationMode(value: unknown): value is FiltrationMode {
  return (
    typeof value === "string" &&
    FILTRATION_MODES.some((mode) => mode === value)
  );
}

export interface FiltrationSnapshot {
  readonly mode: FiltrationMode;
  readonly active: boolean;
  readonly startedAt: number | null;
  readonly targetVolume: number;
  readonly processedVolume: number;
}

export interface ReadingProgress {
  processedVolume: number;
  targetVolume: number;
  progressPercent: number;
  elapsedMinutes: number;
}

export interface SensorReading {
  flow: number;
  ph: number;
  turbidity: number;
  tds: number;
  progress?: ReadingProgress;
}

/**
 * Telemetry payload as published on `<namespace>/sensors/<device>/data`
 */
export interface SensorPayload {
  flow: number;
  ph: number;
  turbidity: number;
  tds: number;
  _meta?: {
    filtration_active: true;
    processed_volume: number;
    target_volume: number;
    progress: number;
    elapsed_minutes: number;
  };
}

export const SET_FILTER_MODE = "set_filter_mode";

export type FilterCommand =
  | { kind: typeof SET_FILTER_MODE; mode: unknown }
  | { kind: "unsupported"; command: string };

export type CommandStatus = "processing" | "success" | "error";

export interface CommandResponse {
  command: string;
  status: CommandStatus;
  message: string;
  timestamp: string;
}
