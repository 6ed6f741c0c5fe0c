/**
 * Rollout drivers.
 *
 * One step fully completes (act, execute, observe, record) before the next
 * begins, so an episode's order is exactly the call order. A step that fails
 * to execute records nothing and the error propagates to the caller; the
 * episode-end callbacks still fire.
 */

import type { AgentPool } from "./agents";
import { CallbackBus } from "./callbacks";
import type { Environment } from "./environment";
import { InMemoryEpisode } from "./episode";
import { KeyMismatchError, NotFoundError } from "./errors";
import { logger } from "./logging";
import { createStep } from "./schemas";
import type { Action, Agent, Callback, ComputerObservation, Episode, MaybePromise, StepResult } from "./types";

export type EpisodeFactory<O, A> = (episodeName: string) => MaybePromise<Episode<O, A>>;

export interface DriverOptions<O, A> {
  callbacks?: Callback<O, A>;
  /** Where each rollout is recorded (in memory by default). */
  episodeFactory?: EpisodeFactory<O, A>;
  maxSteps?: number;
}

export interface RunEpisodeOptions {
  maxSteps?: number;
  episodeName?: string;
}

export interface EpisodeResult<O, A> {
  name: string;
  episode: Episode<O, A>;
  steps: number;
  totalReward: number;
  /** False when the rollout stopped at max steps. */
  done: boolean;
}

export const DEFAULT_MAX_STEPS = 100;

function inMemoryFactory<O, A>(): EpisodeFactory<O, A> {
  return () => new InMemoryEpisode<O, A>();
}

/** Single agent against a single environment. The driver does not close the environment. */
export class Driver<O = ComputerObservation, A = Action> {
  private readonly callbacks: Callback<O, A>;
  private readonly episodeFactory: EpisodeFactory<O, A>;
  private readonly maxSteps: number;
  private episodeCount = 0;

  constructor(
    readonly env: Environment<O, A>,
    readonly agent: Agent<O, A>,
    options: DriverOptions<O, A> = {}
  ) {
    this.callbacks = options.callbacks ?? new CallbackBus<O, A>();
    this.episodeFactory = options.episodeFactory ?? inMemoryFactory<O, A>();
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  }

  async runEpisode(options: RunEpisodeOptions = {}): Promise<EpisodeResult<O, A>> {
    const maxSteps = options.maxSteps ?? this.maxSteps;
    const name = options.episodeName ?? `episode_${this.episodeCount++}`;
    const episode = await this.episodeFactory(name);

    let observation: O = await this.env.reset();
    await this.agent.reset();

    let steps = 0;
    let done = false;
    try {
      await this.callbacks.onEpisodeStart?.();
      while (!done && steps < maxSteps) {
        const action = await this.agent.act(observation);
        const result = await this.env.step(action);
        await this.agent.update(result.reward);
        await episode.push(createStep(result.observation, action, result.reward, result.info));
        await this.callbacks.onStep?.(result.observation, action, result.reward, result.info, result.done, steps);
        observation = result.observation;
        done = result.done;
        steps++;
      }
    } finally {
      await this.callbacks.onEpisodeEnd?.(name);
    }

    logger.debug(`Episode ${name} finished after ${steps} steps (done=${done})`);
    return { name, episode, steps, totalReward: episode.totalReward(), done };
  }
}

/**
 * Many agents, each against its own environment, keyed by agent id. All
 * environments step together; the rollout ends as soon as any of them
 * reports done, which keeps every key set identical at every step.
 */
export class PoolDriver<O = ComputerObservation, A = Action> {
  private readonly envs: Map<string, Environment<O, A>>;
  private readonly callbacks: Callback<O, A>;
  private readonly episodeFactory: EpisodeFactory<O, A>;
  private readonly maxSteps: number;
  private episodeCount = 0;

  constructor(
    readonly pool: AgentPool<O, A>,
    envs: Record<string, Environment<O, A>>,
    options: DriverOptions<O, A> = {}
  ) {
    const ids = pool.ids;
    const keys = Object.keys(envs);
    if (keys.length !== ids.length || keys.some((key) => !ids.includes(key))) {
      throw new KeyMismatchError("Environment", ids, keys);
    }
    this.envs = new Map(Object.entries(envs));
    this.callbacks = options.callbacks ?? new CallbackBus<O, A>();
    this.episodeFactory = options.episodeFactory ?? inMemoryFactory<O, A>();
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  }

  /** Grow the pool by one agent bound to `env`; returns the new agent id. */
  addAgent(env: Environment<O, A>): string {
    const id = this.pool.addAgent();
    this.envs.set(id, env);
    return id;
  }

  getEnvironment(id: string): Environment<O, A> {
    const env = this.envs.get(id);
    if (!env) throw new NotFoundError("environment", id);
    return env;
  }

  async runEpisode(options: RunEpisodeOptions = {}): Promise<Record<string, EpisodeResult<O, A>>> {
    const maxSteps = options.maxSteps ?? this.maxSteps;
    const baseName = options.episodeName ?? `episode_${this.episodeCount++}`;
    const ids = this.pool.ids;

    const names: Record<string, string> = {};
    const episodes: Record<string, Episode<O, A>> = {};
    const observations: Record<string, O> = {};
    for (const id of ids) {
      names[id] = `${baseName}-${id}`;
      episodes[id] = await this.episodeFactory(names[id]);
      observations[id] = await this.getEnvironment(id).reset();
    }
    await this.pool.reset();

    let steps = 0;
    let done = false;
    try {
      await this.callbacks.onEpisodeStart?.();
      while (!done && steps < maxSteps) {
        const actions = await this.pool.act(observations);
        const results: Record<string, StepResult<O>> = {};
        for (const id of ids) {
          results[id] = await this.getEnvironment(id).step(actions[id]);
        }

        const rewards: Record<string, number> = {};
        for (const id of ids) rewards[id] = results[id].reward;
        await this.pool.update(rewards);

        for (const id of ids) {
          const { observation, reward, info } = results[id];
          await episodes[id].push(createStep(observation, actions[id], reward, info));
          await this.callbacks.onStep?.(observation, actions[id], reward, info, results[id].done, steps);
          observations[id] = observation;
          done ||= results[id].done;
        }
        steps++;
      }
    } finally {
      for (const id of ids) await this.callbacks.onEpisodeEnd?.(names[id]);
    }

    const results: Record<string, EpisodeResult<O, A>> = {};
    for (const id of ids) {
      const episode = episodes[id];
      results[id] = { name: names[id], episode, steps, totalReward: episode.totalReward(), done };
    }
    return results;
  }
}
