/**
 * Gym configuration.
 *
 * YAML files are either wrapped:
 *
 * ```yaml
 * spec: computer-gym
 * spec_version: "0.1.0"
 * data:
 *   backend: vnc
 *   episodes: { storage: file, dir: runs }
 * ```
 *
 * or the bare `data` mapping. Every field has a default, so `{}` is valid.
 */

import { readFileSync } from "fs";
import { dirname, join, resolve } from "path";
import yaml from "yaml";
import { z } from "zod";
import { CallbackBus, WebhookCallback } from "./callbacks";
import { ComputerEnvironment, type ComputerEnvironmentOptions } from "./environment";
import { FileEpisode, InMemoryEpisode } from "./episode";
import type { DriverOptions, EpisodeFactory } from "./driver";
import { ConfigError, isNotFound } from "./errors";
import { GoalStateEvaluator, TrajectoryEvaluator } from "./evaluators";
import { type LLMBackend, type LLMOptions, VercelAIBackend } from "./llm";
import { type BackendMapping, getMapping } from "./mapping";
import { RemoteProcess } from "./remote_process";
import { computerStepCodec } from "./schemas";
import type { Action, Callback, ComputerBackend, ComputerObservation, ProcessChannel } from "./types";

export const CONFIG_SPEC = "computer-gym";

const modelSchema = z
  .object({
    provider: z.string().default("openai"),
    name: z.string(),
    temperature: z.number().min(0).optional(),
    max_tokens: z.number().int().positive().optional(),
  })
  .strict();

export const configDataSchema = z
  .object({
    backend: z.string().default("pyautogui"),
    max_steps: z.number().int().positive().default(100),
    observe: z
      .array(z.enum(["screenshot", "mouse_state", "keyboard_state"]))
      .default(["screenshot", "mouse_state", "keyboard_state"]),
    episodes: z
      .object({
        storage: z.enum(["memory", "file"]).default("memory"),
        dir: z.string().default("episodes"),
        encoding: z.enum(["json", "binary"]).default("json"),
      })
      .strict()
      .default({}),
    callbacks: z
      .object({
        isolate: z.boolean().default(false),
        webhook: z.string().url().optional(),
      })
      .strict()
      .default({}),
    evaluator: z
      .object({
        model: modelSchema.optional(),
        step_sample_modulus: z.number().int().positive().default(5),
      })
      .strict()
      .default({}),
    process: z
      .object({
        poll_interval_ms: z.number().int().positive().default(50),
      })
      .strict()
      .default({}),
  })
  .strict();

const wrapperSchema = z
  .object({
    spec: z.literal(CONFIG_SPEC),
    spec_version: z.string().optional(),
    data: z.unknown().optional(),
  })
  .strict();

export type GymConfig = z.output<typeof configDataSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, prefix: string): T {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  const path = [prefix, ...(issue?.path ?? [])].filter((part) => part !== "").join(".");
  throw new ConfigError(`Invalid config at ${path || "(root)"}: ${issue?.message}`, { cause: parsed.error });
}

/**
 * Validate a config given as YAML text or as an already-parsed object.
 * `episodes.dir` is resolved against `baseDir`.
 */
export function parseConfig(source: string | Record<string, unknown>, baseDir = process.cwd()): GymConfig {
  let value: unknown = source;
  if (typeof source === "string") {
    try {
      value = yaml.parse(source);
    } catch (error) {
      throw new ConfigError("Config is not valid YAML", { cause: error });
    }
  }
  value ??= {};

  let data: unknown = value;
  let prefix = "";
  if (isRecord(value) && "spec" in value) {
    data = validate(wrapperSchema, value, "").data ?? {};
    prefix = "data";
  }
  const config = validate(configDataSchema, data, prefix);
  config.episodes.dir = resolve(baseDir, config.episodes.dir);
  return config;
}

export function loadConfig(path: string): GymConfig {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    if (isNotFound(error)) throw new ConfigError(`Config file not found: ${path}`, { cause: error });
    throw error;
  }
  return parseConfig(text, dirname(resolve(path)));
}

export function mappingFor(config: GymConfig): BackendMapping {
  return getMapping(config.backend);
}

/** Memory episodes, or file episodes under `<episodes.dir>/<episodeName>` started empty. */
export function createEpisodeFactory(config: GymConfig): EpisodeFactory<ComputerObservation, Action> {
  const { storage, dir, encoding } = config.episodes;
  if (storage === "memory") return () => new InMemoryEpisode();
  return async (episodeName) => {
    const episode = new FileEpisode(join(dir, episodeName), computerStepCodec, encoding);
    await episode.clear();
    return episode;
  };
}

export function createCallbackBus(
  config: GymConfig,
  callbacks: Iterable<Callback<ComputerObservation, Action>> = []
): CallbackBus<ComputerObservation, Action> {
  const bus = new CallbackBus(callbacks, { isolate: config.callbacks.isolate });
  if (config.callbacks.webhook) bus.register(new WebhookCallback(config.callbacks.webhook));
  return bus;
}

/** Max steps, episode storage and callbacks for a Driver or PoolDriver. */
export function createDriverOptions(
  config: GymConfig,
  callbacks: Iterable<Callback<ComputerObservation, Action>> = []
): DriverOptions<ComputerObservation, Action> {
  return {
    maxSteps: config.max_steps,
    episodeFactory: createEpisodeFactory(config),
    callbacks: createCallbackBus(config, callbacks),
  };
}

export function createEnvironment(
  config: GymConfig,
  backend: ComputerBackend,
  options: Omit<ComputerEnvironmentOptions, "observe"> = {}
): ComputerEnvironment {
  return new ComputerEnvironment(backend, { ...options, observe: config.observe });
}

export function createRemoteProcess(
  config: GymConfig,
  channel: ProcessChannel,
  pid: number,
  executable: string
): RemoteProcess {
  return new RemoteProcess(channel, pid, executable, { pollIntervalMs: config.process.poll_interval_ms });
}

export function evaluatorLLMOptions(config: GymConfig): LLMOptions {
  const model = config.evaluator.model;
  return { temperature: model?.temperature, max_tokens: model?.max_tokens };
}

export function createEvaluatorBackend(config: GymConfig): LLMBackend {
  const model = config.evaluator.model;
  if (!model) throw new ConfigError("Config has no evaluator.model; an LLM evaluator needs one");
  return new VercelAIBackend({ provider: model.provider, name: model.name });
}

export type LLMEvaluatorKind = "goal_state" | "trajectory";

export function createEvaluator(
  config: GymConfig,
  kind: LLMEvaluatorKind,
  backend: LLMBackend = createEvaluatorBackend(config)
): GoalStateEvaluator | TrajectoryEvaluator {
  const llmOptions = evaluatorLLMOptions(config);
  if (kind === "goal_state") return new GoalStateEvaluator(backend, { llmOptions });
  return new TrajectoryEvaluator(backend, {
    llmOptions,
    stepSampleModulus: config.evaluator.step_sample_modulus,
  });
}
