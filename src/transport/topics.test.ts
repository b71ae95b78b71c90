import { describe, it, expect } from "vitest";
import { deviceTopics } from "./topics";

describe("deviceTopics", () => {
  it("places device topics under the default namespace", () => {
    expect(deviceTopics("test_device_001")).toEqual({
      sensorData: "aquasmart/sensors/test_device_001/data",
      filterCommand: "aquasmart/commands/filter",
      commandResponse: "aquasmart/commands/test_device_001/response",
    });
  });

  it("uses a custom namespace", () => {
    expect(deviceTopics("d2", "plant-a").sensorData).toBe("plant-a/sensors/d2/data");
  });
});
