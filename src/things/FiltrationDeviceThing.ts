import type WoT from "wot-typescript-definitions";
import type { FiltrationSimulator } from "../simulator/FiltrationSimulator";
import { logEvent } from "../utils/eventLog";
import { ThingBase, ThingRuntime } from "./ThingBase";

/**
 * FiltrationDeviceThing - HTTP surface of a simulated filtration device.
 *
 * Exposes the state of the current filtration run and the latest sensor
 * reading as properties. The `setFilterMode` action goes through the same
 * command path as `<ns>/commands/filter`, so responses are also published
 * on the device's response topic.
 */
export class FiltrationDeviceThing extends ThingBase {
  private readonly simulator: FiltrationSimulator;

  constructor(
    runtime: ThingRuntime,
    td: WoT.ThingDescription,
    simulator: FiltrationSimulator
  ) {
    super(runtime, td);
    this.simulator = simulator;

    const state = () => simulator.process.snapshot();

    this.setPropertyReadHandlers([
      { key: "filterMode", handler: async () => state().mode },
      { key: "filtrationActive", handler: async () => state().active },
      { key: "processedVolume", handler: async () => Number(state().processedVolume.toFixed(2)) },
      { key: "targetVolume", handler: async () => state().targetVolume },
      {
        key: "progress",
        handler: async () => Number((simulator.process.progressRatio() * 100).toFixed(1)),
      },
      { key: "pendingMode", handler: async () => simulator.protocol.pendingMode() },
      { key: "latestReading", handler: async () => simulator.getLatestReading() },
    ]);

    this.setActionHandlers([
      {
        key: "setFilterMode",
        handler: async (params) => {
          const mode = await params.value();
          logEvent(`⚙️ [${this.title}] setFilterMode requested: ${JSON.stringify(mode)}`);
          return this.simulator.setFilterMode(mode);
        },
      },
    ]);

    simulator.onReading(() => {
      this.emitPropertyChange("latestReading");
      this.emitPropertyChange("processedVolume");
      this.emitPropertyChange("filtrationActive");
    });
    simulator.onModeChange(() => {
      this.emitPropertyChange("filterMode");
      this.emitPropertyChange("targetVolume");
    });
  }
}
