import { logger } from "./logging";
import { elideScreenshot } from "./summary";
import type { Action, Callback, ComputerObservation, Info, MaybePromise } from "./types";

export interface CallbackBusOptions {
  /** Log a failing callback and keep going instead of propagating. */
  isolate?: boolean;
}

type CallbackEvent = "onEpisodeStart" | "onStep" | "onEpisodeEnd";

/** Fans each step-loop event out to the registered callbacks, in registration order. */
export class CallbackBus<O = ComputerObservation, A = Action> implements Callback<O, A> {
  private readonly callbacks: Callback<O, A>[];
  readonly isolate: boolean;

  constructor(callbacks: Iterable<Callback<O, A>> = [], options: CallbackBusOptions = {}) {
    this.callbacks = [...callbacks];
    this.isolate = options.isolate ?? false;
  }

  get size(): number {
    return this.callbacks.length;
  }

  register(callback: Callback<O, A>): this {
    this.callbacks.push(callback);
    return this;
  }

  async onEpisodeStart(): Promise<void> {
    await this.dispatch("onEpisodeStart", (callback) => callback.onEpisodeStart?.());
  }

  async onStep(observation: O, action: A, reward: number, info: Info, done: boolean, stepIndex: number): Promise<void> {
    await this.dispatch("onStep", (callback) =>
      callback.onStep?.(observation, action, reward, info, done, stepIndex)
    );
  }

  async onEpisodeEnd(episodeName?: string): Promise<void> {
    await this.dispatch("onEpisodeEnd", (callback) => callback.onEpisodeEnd?.(episodeName));
  }

  private async dispatch(
    event: CallbackEvent,
    invoke: (callback: Callback<O, A>) => MaybePromise<void> | undefined
  ): Promise<void> {
    for (const callback of this.callbacks) {
      try {
        await invoke(callback);
      } catch (error) {
        if (!this.isolate) throw error;
        logger.error(`Callback ${event} failed`, error);
      }
    }
  }
}

export interface WebhookCallbackOptions {
  headers?: Record<string, string>;
}

/**
 * POSTs step-loop events as JSON. Screenshot payloads are elided. A non-2xx
 * response raises, so wrap the bus with `isolate` if delivery is best-effort.
 */
export class WebhookCallback implements Callback<ComputerObservation, Action> {
  constructor(
    readonly url: string,
    private readonly options: WebhookCallbackOptions = {}
  ) {}

  private async send(event: string, data: Record<string, unknown>): Promise<void> {
    const body = JSON.stringify({ event, ...data, timestamp: new Date().toISOString() });
    const response = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.options.headers },
      body,
    });
    if (!response.ok) {
      throw new Error(`Webhook ${this.url} rejected ${event} event with status ${response.status}`);
    }
  }

  async onEpisodeStart(): Promise<void> {
    await this.send("episode_start", {});
  }

  async onStep(
    observation: ComputerObservation,
    action: Action,
    reward: number,
    info: Info,
    done: boolean,
    stepIndex: number
  ): Promise<void> {
    await this.send("step", {
      step: stepIndex,
      observation: elideScreenshot(observation),
      action,
      reward,
      done,
      info,
    });
  }

  async onEpisodeEnd(episodeName?: string): Promise<void> {
    await this.send("episode_end", { episode: episodeName ?? null });
  }
}
