import type { MessageHandler, Transport } from "./Transport";

export interface PublishedMessage {
  topic: string;
  payload: string;
}

/**
 * In-process Transport: records publications and delivers messages injected
 * with `deliver()` to the matching subscribers.
 */
export class InMemoryTransport implements Transport {
  public readonly published: PublishedMessage[] = [];
  private readonly handlers: Map<string, MessageHandler[]> = new Map();
  private failure: Error | null = null;
  private closed = false;

  public async publish(topic: string, payload: string): Promise<void> {
    if (this.closed) {
      throw new Error("Transport is closed");
    }
    if (this.failure) {
      throw this.failure;
    }
    this.published.push({ topic, payload });
  }

  public async subscribe(topic: string, handler: MessageHandler): Promise<void> {
    const handlers = this.handlers.get(topic) ?? [];
    handlers.push(handler);
    this.handlers.set(topic, handlers);
  }

  public async close(): Promise<void> {
    this.closed = true;
    this.handlers.clear();
  }

  /** Make every later publish reject with `error` (null restores delivery). */
  public failPublishes(error: Error | null): void {
    this.failure = error;
  }

  /** Deliver `payload` to the subscribers of `topic` and wait for them. */
  public async deliver(topic: string, payload: string | object): Promise<void> {
    const body = Buffer.from(typeof payload === "string" ? payload : JSON.stringify(payload));
    await Promise.all((this.handlers.get(topic) ?? []).map((handler) => handler(body)));
  }

  /** Parsed payloads published on `topic`, oldest first. */
  public messagesOn(topic: string): unknown[] {
    return this.published
      .filter((message) => message.topic === topic)
      .map((message): unknown => JSON.parse(message.payload));
  }
}
