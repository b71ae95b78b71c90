import {
  CommandResponse,
  CommandStatus,
  FilterCommand,
  FiltrationMode,
  SET_FILTER_MODE,
  isFiltrationMode,
} from "../types/FiltrationTypes";
import type { FiltrationProcess } from "../simulation/FiltrationProcess";

/**
 * Delivers one response. A rejected promise aborts the command that
 * produced it and is propagated to the caller of `handleCommand`.
 */
export type ResponseSink = (response: CommandResponse) => Promise<void>;

export interface CommandProtocolOptions {
  settlingDelayMs: number;
  /** Waits out the settling delay. Defaults to a timer. */
  delay?: (ms: number) => Promise<void>;
  /** Response timestamps. Defaults to the current time. */
  now?: () => Date;
  /** Called once a new run has started after a mode switch */
  onModeChanged?: (mode: FiltrationMode) => void;
  /**
   * Checked before each response and again after the settling delay. Once it
   * returns true, nothing more is emitted and a pending switch is dropped.
   */
  isCancelled?: () => boolean;
}

const timerDelay = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Decode an inbound command payload.
 * @returns null when the payload is not a JSON object with a string
 * `command`, or is a `set_filter_mode` without a `mode`
 */
export function decodeCommand(payload: Buffer | string): FilterCommand | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.toString());
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  const command: unknown = Reflect.get(parsed, "command");
  if (typeof command !== "string") {
    return null;
  }
  if (command === SET_FILTER_MODE) {
    const mode: unknown = Reflect.get(parsed, "mode");
    return mode === undefined ? null : { kind: SET_FILTER_MODE, mode };
  }
  return { kind: "unsupported", command };
}

/**
 * CommandProtocol - applies filter mode commands to a FiltrationProcess.
 *
 * Commands run one at a time: the responses of a command are emitted in
 * order and never interleave with those of another command. The settling
 * delay is a timer, so readings keep flowing (against the old run) while a
 * switch is pending.
 */
export class CommandProtocol {
  private readonly process: FiltrationProcess;
  private readonly settlingDelayMs: number;
  private readonly delay: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly onModeChanged?: (mode: FiltrationMode) => void;
  private readonly isCancelled: () => boolean;

  private queue: Promise<unknown> = Promise.resolve();
  private switchingTo: FiltrationMode | null = null;

  constructor(process: FiltrationProcess, options: CommandProtocolOptions) {
    this.process = process;
    this.settlingDelayMs = options.settlingDelayMs;
    this.delay = options.delay ?? timerDelay;
    this.now = options.now ?? (() => new Date());
    this.onModeChanged = options.onModeChanged;
    this.isCancelled = options.isCancelled ?? (() => false);
  }

  /** Mode of the switch currently settling, if any */
  public pendingMode(): FiltrationMode | null {
    return this.switchingTo;
  }

  /**
   * Handle one decoded command.
   * @returns the responses emitted, in emission order
   */
  public handleCommand(
    command: FilterCommand,
    emit: ResponseSink
  ): Promise<CommandResponse[]> {
    const run = this.queue.then(() => this.apply(command, emit));
    // Keep the queue alive after a failure; the failure itself reaches the caller through `run`.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async apply(
    command: FilterCommand,
    emit: ResponseSink
  ): Promise<CommandResponse[]> {
    if (command.kind !== SET_FILTER_MODE || this.isCancelled()) {
      return [];
    }

    const emitted: CommandResponse[] = [];
    const respond = async (status: CommandStatus, message: string): Promise<void> => {
      if (this.isCancelled()) return;
      const response: CommandResponse = {
        command: SET_FILTER_MODE,
        status,
        message,
        timestamp: this.now().toISOString(),
      };
      await emit(response);
      emitted.push(response);
    };

    const mode = command.mode;
    if (!isFiltrationMode(mode)) {
      await respond("error", `Invalid mode: ${String(mode)}`);
      return emitted;
    }

    await respond("processing", `Switching to ${mode} mode`);

    this.switchingTo = mode;
    try {
      await this.delay(this.settlingDelayMs);
      if (this.isCancelled()) return emitted;
      this.process.start(mode);
    } finally {
      this.switchingTo = null;
    }
    this.onModeChanged?.(mode);

    await respond("success", `Successfully switched to ${mode} mode`);
    return emitted;
  }
}
