import type { LatestValueChannel } from "./channel";
import { ActionExecutionFailure, EnvironmentStateError } from "./errors";
import { buttonFromBackend, buttonToBackend, keyFromBackend, keyToBackend } from "./mapping";
import type { KeyboardKey, MouseButton } from "./keys";
import type {
  Action,
  ComputerBackend,
  ComputerObservation,
  Info,
  MaybePromise,
  ObservationType,
  StepResult,
} from "./types";

export type EnvironmentState = "uninitialized" | "active" | "closed";

export interface EnvironmentOptions<O> {
  /** Every observation returned by reset/step is also published here. */
  channel?: LatestValueChannel<O>;
}

/**
 * Perceive/act loop for one agent.
 *
 * uninitialized -> active on reset, active -> active on each successful step,
 * any -> closed on close. A closed environment cannot be reset again.
 */
export abstract class Environment<O = ComputerObservation, A = Action> {
  private lifecycle: EnvironmentState = "uninitialized";
  protected readonly channel?: LatestValueChannel<O>;

  constructor(options: EnvironmentOptions<O> = {}) {
    this.channel = options.channel;
  }

  get state(): EnvironmentState {
    return this.lifecycle;
  }

  /** Returns whether the backend accepted the action. */
  protected abstract executeAction(action: A): Promise<boolean>;
  protected abstract getObservation(): Promise<O>;
  protected abstract getReward(action: A, observation: O): MaybePromise<number>;
  protected abstract getDone(action: A, observation: O): MaybePromise<boolean>;

  protected getInfo(): MaybePromise<Info> {
    return {};
  }

  protected async onReset(): Promise<void> {}

  protected async onClose(): Promise<void> {}

  async reset(): Promise<O> {
    if (this.lifecycle === "closed") throw new EnvironmentStateError("Cannot reset a closed environment");
    await this.onReset();
    this.lifecycle = "active";
    return this.publish(await this.getObservation());
  }

  /**
   * Execute one action. A rejected or throwing action raises
   * ActionExecutionFailure before any observation is taken.
   */
  async step(action: A): Promise<StepResult<O>> {
    if (this.lifecycle === "uninitialized") throw new EnvironmentStateError("Call reset() before step()");
    if (this.lifecycle === "closed") throw new EnvironmentStateError("Cannot step a closed environment");

    let executed: boolean;
    try {
      executed = await this.executeAction(action);
    } catch (error) {
      throw new ActionExecutionFailure(action, { cause: error });
    }
    if (!executed) throw new ActionExecutionFailure(action);

    const observation = this.publish(await this.getObservation());
    const reward = await this.getReward(action, observation);
    const done = await this.getDone(action, observation);
    const info = await this.getInfo();
    return { observation, reward, done, info };
  }

  /** Idempotent. */
  async close(): Promise<void> {
    if (this.lifecycle === "closed") return;
    this.lifecycle = "closed";
    await this.onClose();
  }

  private publish(observation: O): O {
    if (this.channel && !this.channel.closed) this.channel.publish(observation);
    return observation;
  }
}

export type RewardFn = (action: Action, observation: ComputerObservation) => MaybePromise<number>;
export type DoneFn = (action: Action, observation: ComputerObservation) => MaybePromise<boolean>;

export const ALL_OBSERVATIONS: readonly ObservationType[] = ["screenshot", "mouse_state", "keyboard_state"];

export interface ComputerEnvironmentOptions extends EnvironmentOptions<ComputerObservation> {
  observe?: readonly ObservationType[];
  rewardFn?: RewardFn;
  doneFn?: DoneFn;
}

/** Drives a ComputerBackend with canonical actions, translating through its mapping table. */
export class ComputerEnvironment extends Environment<ComputerObservation, Action> {
  readonly observe: readonly ObservationType[];
  private readonly rewardFn: RewardFn;
  private readonly doneFn: DoneFn;

  constructor(
    readonly backend: ComputerBackend,
    options: ComputerEnvironmentOptions = {}
  ) {
    super(options);
    this.observe = options.observe ?? ALL_OBSERVATIONS;
    this.rewardFn = options.rewardFn ?? (() => 0);
    this.doneFn = options.doneFn ?? (() => false);
  }

  protected async executeAction(action: Action): Promise<boolean> {
    const { backend } = this;
    const { mapping } = backend;
    switch (action.type) {
      case "key_down":
        return backend.injectKey(keyToBackend(action.key, mapping), true);
      case "key_up":
        return backend.injectKey(keyToBackend(action.key, mapping), false);
      case "type_text":
        return backend.injectText(action.text);
      case "mouse_move":
        return backend.injectMouseMove(action.x, action.y, action.duration);
      case "mouse_button_down":
        return backend.injectMouseButton(buttonToBackend(action.button, mapping), true);
      case "mouse_button_up":
        return backend.injectMouseButton(buttonToBackend(action.button, mapping), false);
      case "mouse_scroll":
        return backend.injectScroll(action.delta);
    }
  }

  protected async getObservation(): Promise<ComputerObservation> {
    const { backend } = this;
    const { mapping } = backend;
    const observation: ComputerObservation = {};
    if (this.observe.includes("screenshot")) {
      const shot = await backend.captureScreenshot();
      observation.screenshot = { type: "screenshot", data: shot.data, format: shot.format };
    }
    if (this.observe.includes("mouse_state")) {
      const mouse = await backend.getMouseState();
      const pressed: MouseButton[] = [];
      for (const native of mouse.pressed) {
        const button = buttonFromBackend(native, mapping);
        if (button !== undefined) pressed.push(button);
      }
      observation.mouseState = { type: "mouse_state", position: { ...mouse.position }, pressed };
    }
    if (this.observe.includes("keyboard_state")) {
      const pressed: KeyboardKey[] = [];
      for (const native of await backend.getKeyboardState()) {
        const key = keyFromBackend(native, mapping);
        if (key !== undefined) pressed.push(key);
      }
      observation.keyboardState = { type: "keyboard_state", pressed };
    }
    return observation;
  }

  protected getReward(action: Action, observation: ComputerObservation): MaybePromise<number> {
    return this.rewardFn(action, observation);
  }

  protected getDone(action: Action, observation: ComputerObservation): MaybePromise<boolean> {
    return this.doneFn(action, observation);
  }

  protected async onClose(): Promise<void> {
    await this.backend.close?.();
  }
}
