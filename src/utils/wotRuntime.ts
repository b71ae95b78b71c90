import * as fs from "fs";
import { HttpServer } from "@node-wot/binding-http";
import { Servient } from "@node-wot/core";
import type WoT from "wot-typescript-definitions";

export interface WoTRuntimeHandle {
  wot: typeof WoT;
  shutdown(): Promise<void>;
}

/**
 * Start a servient serving exposed Things over HTTP on `port`.
 */
export async function createWoTRuntimeAsync(port: number): Promise<WoTRuntimeHandle> {
  const servient = new Servient();
  servient.addServer(new HttpServer({ port: port }));

  const wot = await servient.start();
  return {
    wot,
    shutdown: () => servient.shutdown(),
  };
}

export const getTDFromFile = (filePath: string): WoT.ThingDescription =>
  JSON.parse(fs.readFileSync(filePath).toString());
