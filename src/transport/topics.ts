export const DEFAULT_NAMESPACE = "aquasmart";

export interface DeviceTopics {
  /** Telemetry published by the device */
  sensorData: string;
  /** Commands shared by every device of the namespace */
  filterCommand: string;
  /** Responses to commands, per device */
  commandResponse: string;
}

export function deviceTopics(
  deviceId: string,
  namespace: string = DEFAULT_NAMESPACE
): DeviceTopics {
  return {
    sensorData: `${namespace}/sensors/${deviceId}/data`,
    filterCommand: `${namespace}/commands/filter`,
    commandResponse: `${namespace}/commands/${deviceId}/response`,
  };
}
