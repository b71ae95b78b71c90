export type MessageHandler = (payload: Buffer) => void | Promise<void>;

/**
 * Publish/subscribe capability the simulator talks to.
 * Connection and session management stay behind this boundary.
 */
export interface Transport {
  publish(topic: string, payload: string): Promise<void>;
  subscribe(topic: string, handler: MessageHandler): Promise<void>;
  close(): Promise<void>;
}
