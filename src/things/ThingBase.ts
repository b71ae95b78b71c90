import type WoT from "wot-typescript-definitions";
import { logEvent } from "../utils/eventLog";

/**
 * The parts of a produced `ExposedThing` the device Things use.
 */
export interface ExposableThing {
  setPropertyReadHandler(name: string, handler: WoT.PropertyReadHandler): unknown;
  setActionHandler(name: string, handler: WoT.ActionHandler): unknown;
  emitPropertyChange(name: string): void;
  expose(): Promise<void>;
  destroy(): Promise<void>;
}

/**
 * The part of the WoT runtime used to produce Things.
 */
export interface ThingRuntime {
  produce(init: WoT.ThingDescription): Promise<ExposableThing>;
}

/**
 * Abstract base class for Things.
 *
 * Holds the WoT runtime reference and the Thing Description used to
 * produce an `ExposedThing`. Subclasses register property and action
 * handlers before the Thing is exposed.
 */
export abstract class ThingBase {
  private runtime: ThingRuntime;

  /**
   * The Thing Description (TD) / model used when producing the ExposedThing.
   */
  private target: WoT.ThingDescription;

  private readonly propertyReadHandlers: Map<string, WoT.PropertyReadHandler> =
    new Map();

  private readonly actionHandlers: Map<string, WoT.ActionHandler> = new Map();

  /**
   * The produced thing, null until `startAsync` resolves.
   */
  private thing: ExposableThing | null = null;

  constructor(runtime: ThingRuntime, target: WoT.ThingDescription) {
    this.runtime = runtime;
    this.target = target;
  }

  public get title(): string {
    return this.target.title;
  }

  /**
   * Produce the `ExposedThing`, attach registered handlers and expose it.
   */
  public async startAsync(): Promise<void> {
    const thing = await this.runtime.produce(this.target);

    this.propertyReadHandlers.forEach((handler, key) => {
      thing.setPropertyReadHandler(key, handler);
    });

    this.actionHandlers.forEach((handler, key) => {
      thing.setActionHandler(key, handler);
    });

    await thing.expose();
    this.thing = thing;
    logEvent(`${this.target.title} thing started!`);
  }

  /**
   * Withdraw the Thing from the runtime.
   */
  public async stopAsync(): Promise<void> {
    const thing = this.thing;
    this.thing = null;
    if (thing) {
      await thing.destroy();
    }
  }

  /**
   * Register multiple property read handlers.
   * An existing handler for the same key is logged and overwritten.
   */
  protected setPropertyReadHandlers = (
    keyedHandlersArray: Array<{ key: string; handler: WoT.PropertyReadHandler }>
  ): void =>
    keyedHandlersArray.forEach(({ key, handler }) => {
      if (this.propertyReadHandlers.has(key)) {
        logEvent(`Property read handler for ${key} already set. Handler will be overwritten.`, "WARN");
      }
      this.propertyReadHandlers.set(key, handler);
    });

  /**
   * Register multiple action handlers.
   * An existing handler for the same key is logged and overwritten.
   */
  protected setActionHandlers = (
    handlersArray: Array<{ key: string; handler: WoT.ActionHandler }>
  ): void =>
    handlersArray.forEach(({ key, handler }) => {
      if (this.actionHandlers.has(key)) {
        logEvent(`Action handler for ${key} already set. Handler will be overwritten.`, "WARN");
      }
      this.actionHandlers.set(key, handler);
    });

  /**
   * Emit a property change notification. Ignored until the Thing is exposed.
   */
  protected emitPropertyChange = (key: string): void => {
    this.thing?.emitPropertyChange(key);
  };
}
