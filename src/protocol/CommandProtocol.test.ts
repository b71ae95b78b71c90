import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { CommandProtocol, decodeCommand } from "./CommandProtocol";
import { FiltrationProcess } from "../simulation/FiltrationProcess";
import type { CommandResponse } from "../types/FiltrationTypes";

const TIMESTAMP = "2026-01-01T00:00:00.000Z";

function setup(onModeChanged?: (mode: string) => void, isCancelled?: () => boolean) {
  const process = new FiltrationProcess({
    mode: "drinking_water",
    targetVolumes: { drinking_water: 50.0, household_water: 75.0 },
    now: () => 0,
  });
  process.start("drinking_water");
  process.tick(2, 2.5);

  const protocol = new CommandProtocol(process, {
    settlingDelayMs: 2000,
    now: () => new Date(TIMESTAMP),
    onModeChanged,
    isCancelled,
  });
  const sent: CommandResponse[] = [];
  const emit = async (response: CommandResponse) => {
    sent.push(response);
  };
  return { process, protocol, sent, emit };
}

describe("decodeCommand", () => {
  it("decodes set_filter_mode", () => {
    expect(decodeCommand('{"command":"set_filter_mode","mode":"household_water"}')).toEqual({
      kind: "set_filter_mode",
      mode: "household_water",
    });
  });

  it("keeps an unrecognised mode for validation", () => {
    expect(decodeCommand(Buffer.from('{"command":"set_filter_mode","mode":42}'))).toEqual({
      kind: "set_filter_mode",
      mode: 42,
    });
  });

  it("tags other commands as unsupported", () => {
    expect(decodeCommand('{"command":"flush_filter"}')).toEqual({
      kind: "unsupported",
      command: "flush_filter",
    });
  });

  it.each([
    ["not json", "set_filter_mode"],
    ["array", '["set_filter_mode"]'],
    ["null", "null"],
    ["missing command", '{"mode":"drinking_water"}'],
    ["non-string command", '{"command":7}'],
    ["missing mode", '{"command":"set_filter_mode"}'],
  ])("drops a malformed payload (%s)", (_label, payload) => {
    expect(decodeCommand(payload)).toBeNull();
  });
});

describe("CommandProtocol", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("answers an invalid mode with one error and leaves the process untouched", async () => {
    const { process, protocol, sent, emit } = setup();
    const before = process.snapshot();

    const responses = await protocol.handleCommand(
      { kind: "set_filter_mode", mode: "invalid_mode" },
      emit
    );

    expect(responses).toEqual([
      {
        command: "set_filter_mode",
        status: "error",
        message: "Invalid mode: invalid_mode",
        timestamp: TIMESTAMP,
      },
    ]);
    expect(sent).toEqual(responses);
    expect(process.snapshot()).toEqual(before);
  });

  it("switches mode after the settling delay", async () => {
    const onModeChanged = vi.fn();
    const { process, protocol, sent, emit } = setup(onModeChanged);

    const pending = protocol.handleCommand({ kind: "set_filter_mode", mode: "household_water" }, emit);
    await vi.advanceTimersByTimeAsync(0);

    expect(sent.map((r) => r.status)).toEqual(["processing"]);
    expect(sent[0].message).toBe("Switching to household_water mode");
    expect(protocol.pendingMode()).toBe("household_water");
    expect(process.snapshot()).toMatchObject({ mode: "drinking_water", processedVolume: 5, targetVolume: 50 });

    await vi.advanceTimersByTimeAsync(2000);
    const responses = await pending;

    expect(responses.map((r) => r.status)).toEqual(["processing", "success"]);
    expect(responses[1].message).toBe("Successfully switched to household_water mode");
    expect(process.snapshot()).toMatchObject({
      mode: "household_water",
      active: true,
      processedVolume: 0,
      targetVolume: 75.0,
    });
    expect(protocol.pendingMode()).toBeNull();
    expect(onModeChanged).toHaveBeenCalledWith("household_water");
  });

  it("lets ticks during the settling window act on the old run", async () => {
    const { process, protocol, emit } = setup();

    const pending = protocol.handleCommand({ kind: "set_filter_mode", mode: "household_water" }, emit);
    await vi.advanceTimersByTimeAsync(1000);
    process.tick(0.5, 2.0);
    expect(process.snapshot()).toMatchObject({ mode: "drinking_water", processedVolume: 6, targetVolume: 50 });

    await vi.advanceTimersByTimeAsync(1000);
    await pending;
    expect(process.snapshot()).toMatchObject({ mode: "household_water", processedVolume: 0, targetVolume: 75 });
  });

  it("never interleaves the responses of two commands", async () => {
    const { process, protocol, sent, emit } = setup();

    const first = protocol.handleCommand({ kind: "set_filter_mode", mode: "household_water" }, emit);
    const second = protocol.handleCommand({ kind: "set_filter_mode", mode: "drinking_water" }, emit);
    await vi.advanceTimersByTimeAsync(2000);
    await first;
    await vi.advanceTimersByTimeAsync(2000);
    await second;

    expect(sent.map((r) => `${r.status}:${r.message}`)).toEqual([
      "processing:Switching to household_water mode",
      "success:Successfully switched to household_water mode",
      "processing:Switching to drinking_water mode",
      "success:Successfully switched to drinking_water mode",
    ]);
    expect(process.snapshot()).toMatchObject({ mode: "drinking_water", targetVolume: 50 });
  });

  it("abandons a switch cancelled during the settling delay", async () => {
    let cancelled = false;
    const onModeChanged = vi.fn();
    const { process, protocol, sent, emit } = setup(onModeChanged, () => cancelled);
    const before = process.snapshot();

    const pending = protocol.handleCommand({ kind: "set_filter_mode", mode: "household_water" }, emit);
    await vi.advanceTimersByTimeAsync(1000);
    cancelled = true;
    await vi.advanceTimersByTimeAsync(1000);

    expect(await pending).toEqual([expect.objectContaining({ status: "processing" })]);
    expect(sent.map((r) => r.status)).toEqual(["processing"]);
    expect(process.snapshot()).toEqual(before);
    expect(protocol.pendingMode()).toBeNull();
    expect(onModeChanged).not.toHaveBeenCalled();

    await expect(
      protocol.handleCommand({ kind: "set_filter_mode", mode: "invalid_mode" }, emit)
    ).resolves.toEqual([]);
    expect(sent).toHaveLength(1);
  });

  it("ignores unsupported commands", async () => {
    const { process, protocol, emit } = setup();
    const before = process.snapshot();
    const emitSpy = vi.fn(emit);

    await expect(
      protocol.handleCommand({ kind: "unsupported", command: "flush_filter" }, emitSpy)
    ).resolves.toEqual([]);
    expect(emitSpy).not.toHaveBeenCalled();
    expect(process.snapshot()).toEqual(before);
  });

  it("propagates emit failures without switching and keeps serving commands", async () => {
    const { process, protocol, sent, emit } = setup();
    const failing = async () => {
      throw new Error("broker unavailable");
    };

    await expect(
      protocol.handleCommand({ kind: "set_filter_mode", mode: "household_water" }, failing)
    ).rejects.toThrow("broker unavailable");
    expect(process.snapshot().mode).toBe("drinking_water");

    const pending = protocol.handleCommand({ kind: "set_filter_mode", mode: "household_water" }, emit);
    await vi.advanceTimersByTimeAsync(2000);
    await pending;
    expect(sent.map((r) => r.status)).toEqual(["processing", "success"]);
    expect(process.snapshot().mode).toBe("household_water");
  });
});
