import { IndexOutOfRangeError, KeyMismatchError, NotFoundError } from "./errors";
import { KEYBOARD_KEYS, MOUSE_BUTTONS } from "./keys";
import type { Action, ActionType, Agent, ComputerObservation, Episode } from "./types";

export type AgentFactory<O, A> = (id: string) => Agent<O, A>;

export interface AgentPoolOptions {
  /** Dispatch to all agents concurrently instead of one after another. */
  parallel?: boolean;
}

/**
 * Keyed collection of agents. Observations and rewards are dispatched by
 * key; their key sets must equal the agent ids exactly.
 */
export class AgentPool<O = ComputerObservation, A = Action> {
  private readonly agents = new Map<string, Agent<O, A>>();
  private nextId: number;
  private readonly parallel: boolean;

  constructor(
    private readonly factory: AgentFactory<O, A>,
    ids: Iterable<string> = [],
    options: AgentPoolOptions = {}
  ) {
    for (const id of ids) this.agents.set(id, factory(id));
    const numeric = [...this.agents.keys()].filter((id) => /^\d+$/.test(id)).map(Number);
    this.nextId = numeric.length ? Math.max(...numeric) + 1 : 0;
    this.parallel = options.parallel ?? false;
  }

  get ids(): string[] {
    return [...this.agents.keys()];
  }

  get size(): number {
    return this.agents.size;
  }

  /** Create one agent under the next free numeric id and return that id. */
  addAgent(): string {
    const id = String(this.nextId++);
    this.agents.set(id, this.factory(id));
    return id;
  }

  getAgent(id: string): Agent<O, A> {
    const agent = this.agents.get(id);
    if (!agent) throw new NotFoundError("agent", id);
    return agent;
  }

  async reset(): Promise<void> {
    await this.run(this.ids, async (id) => {
      await this.getAgent(id).reset();
    });
  }

  async act(observations: Record<string, O>): Promise<Record<string, A>> {
    this.checkKeys("Observation", observations);
    const actions: Record<string, A> = {};
    await this.run(this.ids, async (id) => {
      actions[id] = await this.getAgent(id).act(observations[id]);
    });
    return actions;
  }

  async update(rewards: Record<string, number>): Promise<void> {
    this.checkKeys("Reward", rewards);
    await this.run(this.ids, async (id) => {
      await this.getAgent(id).update(rewards[id]);
    });
  }

  private checkKeys(kind: string, input: Record<string, unknown>): void {
    const keys = Object.keys(input);
    if (keys.length !== this.agents.size || keys.some((key) => !this.agents.has(key))) {
      throw new KeyMismatchError(kind, this.agents.keys(), keys);
    }
  }

  private async run(ids: string[], fn: (id: string) => Promise<void>): Promise<void> {
    if (this.parallel) {
      await Promise.all(ids.map(fn));
      return;
    }
    for (const id of ids) await fn(id);
  }
}

export const ACTION_TYPES: readonly ActionType[] = [
  "key_down",
  "key_up",
  "type_text",
  "mouse_move",
  "mouse_button_down",
  "mouse_button_up",
  "mouse_scroll",
];

const TEXT_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789 ";

export interface RandomAgentOptions {
  /** Returns a float in [0, 1). */
  rng?: () => number;
  screenWidth?: number;
  screenHeight?: number;
  actionTypes?: readonly ActionType[];
}

/** Uniformly random canonical actions. Useful as a baseline and for smoke tests. */
export class RandomAgent<O = ComputerObservation> implements Agent<O, Action> {
  totalReward = 0;
  private readonly rng: () => number;
  private readonly width: number;
  private readonly height: number;
  private readonly actionTypes: readonly ActionType[];

  constructor(options: RandomAgentOptions = {}) {
    this.rng = options.rng ?? Math.random;
    this.width = options.screenWidth ?? 1920;
    this.height = options.screenHeight ?? 1080;
    this.actionTypes = options.actionTypes ?? ACTION_TYPES;
  }

  private pick<T>(items: readonly T[]): T {
    return items[Math.floor(this.rng() * items.length)];
  }

  private int(limit: number): number {
    return Math.floor(this.rng() * limit);
  }

  reset(): void {
    this.totalReward = 0;
  }

  act(): Action {
    const type = this.pick(this.actionTypes);
    switch (type) {
      case "key_down":
      case "key_up":
        return { type, key: this.pick(KEYBOARD_KEYS) };
      case "type_text": {
        let text = "";
        const length = 1 + this.int(8);
        for (let i = 0; i < length; i++) text += TEXT_ALPHABET[this.int(TEXT_ALPHABET.length)];
        return { type, text };
      }
      case "mouse_move":
        return { type, x: this.int(this.width), y: this.int(this.height) };
      case "mouse_button_down":
      case "mouse_button_up":
        return { type, button: this.pick(MOUSE_BUTTONS) };
      case "mouse_scroll":
        return { type, delta: this.int(7) - 3 };
    }
  }

  update(reward: number): void {
    this.totalReward += reward;
  }
}

/**
 * Replays a recorded action sequence. Once it runs out it repeats the
 * fallback action, or raises IndexOutOfRangeError when there is none.
 */
export class ReplayAgent<O = ComputerObservation, A = Action> implements Agent<O, A> {
  private cursor = 0;

  constructor(
    private readonly actions: readonly A[],
    private readonly fallback?: A
  ) {}

  static async fromEpisode<O, A>(episode: Episode<O, A>, fallback?: A): Promise<ReplayAgent<O, A>> {
    const actions: A[] = [];
    for await (const step of episode.iterSteps()) actions.push(step.action);
    return new ReplayAgent<O, A>(actions, fallback);
  }

  get remaining(): number {
    return this.actions.length - this.cursor;
  }

  reset(): void {
    this.cursor = 0;
  }

  act(): A {
    if (this.cursor < this.actions.length) return this.actions[this.cursor++];
    if (this.fallback !== undefined) return this.fallback;
    throw new IndexOutOfRangeError(this.cursor, this.actions.length, "replay action");
  }

  update(): void {}
}
