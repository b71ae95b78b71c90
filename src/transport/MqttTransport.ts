import { connectAsync, IClientOptions, MqttClient } from "mqtt";
import { logEvent } from "../utils/eventLog";
import type { MessageHandler, Transport } from "./Transport";

export interface MqttTransportOptions {
  brokerUrl: string;
  clientId: string;
  username?: string;
  password?: string;
}

/**
 * MqttTransport - Transport over an MQTT broker.
 *
 * Reconnection is left to the mqtt client, which resubscribes every topic
 * after it reconnects.
 */
export class MqttTransport implements Transport {
  private readonly handlers: Map<string, MessageHandler[]> = new Map();

  private constructor(private readonly client: MqttClient) {
    this.client.on("message", (topic, payload) => this.dispatch(topic, payload));
    this.client.on("reconnect", () => logEvent("[MQTT] Reconnecting to broker...", "WARN"));
    this.client.on("error", (error) => logEvent(`[MQTT] Client error: ${error.message}`, "ERROR"));
  }

  public static async connect(options: MqttTransportOptions): Promise<MqttTransport> {
    const clientOptions: IClientOptions = {
      clientId: options.clientId,
      keepalive: 60,
      reconnectPeriod: 1000,
      clean: true,
    };
    if (options.username) clientOptions.username = options.username;
    if (options.password) clientOptions.password = options.password;

    const client = await connectAsync(options.brokerUrl, clientOptions);
    logEvent(`✅ [MQTT] Connected to broker at ${options.brokerUrl}`);
    return new MqttTransport(client);
  }

  public async publish(topic: string, payload: string): Promise<void> {
    await this.client.publishAsync(topic, payload);
  }

  public async subscribe(topic: string, handler: MessageHandler): Promise<void> {
    const existing = this.handlers.get(topic);
    if (existing) {
      existing.push(handler);
      return;
    }
    this.handlers.set(topic, [handler]);
    await this.client.subscribeAsync(topic);
    logEvent(`📡 [MQTT] Subscribed to ${topic}`);
  }

  public async close(): Promise<void> {
    this.handlers.clear();
    await this.client.endAsync();
  }

  private dispatch(topic: string, payload: Buffer): void {
    for (const handler of this.handlers.get(topic) ?? []) {
      Promise.resolve()
        .then(() => handler(payload))
        .catch((error: unknown) =>
          logEvent(`[MQTT] Handler for ${topic} failed: ${String(error)}`, "ERROR")
        );
    }
  }
}
