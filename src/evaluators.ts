import yaml from "yaml";
import { z } from "zod";
import { ConfigError, EvaluationParseError } from "./errors";
import type { LLMBackend, LLMOptions, Message } from "./llm";
import { describeObservation } from "./summary";
import { renderTemplate } from "./templating";
import type {
  Action,
  Callback,
  ComputerObservation,
  Episode,
  EvaluationResult,
  Evaluator,
  Info,
  Metrics,
} from "./types";

const verdictSchema = z.object({
  success: z.boolean(),
  reason: z.string().default(""),
  score: z.number().optional(),
});

function parseJsonVerdict(text: string): EvaluationResult | undefined {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return undefined;
  let value: unknown;
  try {
    value = JSON.parse(text.slice(start, end + 1));
  } catch {
    return undefined;
  }
  const parsed = verdictSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Read a model verdict: a JSON object `{"success": bool, "reason": str}`
 * anywhere in the text, or else a reply starting with yes/no.
 */
export function parseVerdict(text: string): EvaluationResult {
  const fromJson = parseJsonVerdict(text);
  if (fromJson) return fromJson;

  const match = /^\s*(yes|no)\b[\s.:,;!-]*([\s\S]*)$/i.exec(text);
  if (match) {
    return { success: match[1].toLowerCase() === "yes", reason: match[2].trim() };
  }
  throw new EvaluationParseError(text);
}

/** Success counters shared by every evaluator. */
abstract class CountingEvaluator<O, A> implements Evaluator<O, A> {
  private evaluations = 0;
  private successes = 0;

  abstract evaluateEpisode(episode: Episode<O, A>, mandate: string): Promise<EvaluationResult>;

  protected record(result: EvaluationResult): EvaluationResult {
    this.evaluations++;
    if (result.success) this.successes++;
    return result;
  }

  protected extraMetrics(): Metrics {
    return {};
  }

  getMetrics(): Metrics {
    return {
      evaluations: this.evaluations,
      successes: this.successes,
      success_rate: this.evaluations ? this.successes / this.evaluations : 0,
      ...this.extraMetrics(),
    };
  }
}

export const JUDGE_SYSTEM_PROMPT =
  "You judge whether a computer-use agent accomplished its mandate. " +
  'Reply with a JSON object: {"success": true|false, "reason": "<one sentence>"}.';

export const GOAL_STATE_TEMPLATE = `Mandate: {{ mandate }}

The episode ran for {{ steps }} steps. The last action was:
{{ action }}

The final observation was:
{{ observation }}

Does the final state satisfy the mandate?`;

export const TRAJECTORY_TEMPLATE = `Mandate: {{ mandate }}

The episode ran for {{ steps }} steps. Sampled steps:
{% for step in sampled %}
Step {{ step.index }}: action={{ step.action }} reward={{ step.reward }}
observation={{ step.observation }}
{% endfor %}
Did the agent make progress towards and achieve the mandate?`;

export interface LLMEvaluatorOptions {
  llmOptions?: LLMOptions;
  systemPrompt?: string;
  /** nunjucks template for the user message. */
  template?: string;
}

abstract class LLMEvaluator extends CountingEvaluator<ComputerObservation, Action> {
  protected readonly systemPrompt: string;

  constructor(
    protected readonly backend: LLMBackend,
    protected readonly options: LLMEvaluatorOptions,
    private readonly defaultTemplate: string
  ) {
    super();
    this.systemPrompt = options.systemPrompt ?? JUDGE_SYSTEM_PROMPT;
  }

  protected async judge(vars: Record<string, unknown>, source: string): Promise<EvaluationResult> {
    const messages: Message[] = [
      { role: "system", content: this.systemPrompt },
      { role: "user", content: renderTemplate(this.options.template ?? this.defaultTemplate, vars, source) },
    ];
    const text = await this.backend.call(messages, this.options.llmOptions);
    return this.record(parseVerdict(text));
  }

  protected empty(): EvaluationResult {
    return this.record({ success: false, reason: "Episode has no steps" });
  }
}

/** Judges only the final observation of the episode against the mandate. */
export class GoalStateEvaluator extends LLMEvaluator {
  constructor(backend: LLMBackend, options: LLMEvaluatorOptions = {}) {
    super(backend, options, GOAL_STATE_TEMPLATE);
  }

  async evaluateEpisode(episode: Episode<ComputerObservation, Action>, mandate: string): Promise<EvaluationResult> {
    if (episode.numSteps === 0) return this.empty();
    const last = await episode.get(episode.numSteps - 1);
    return this.judge(
      {
        mandate,
        steps: episode.numSteps,
        action: JSON.stringify(last.action),
        observation: describeObservation(last.observation),
      },
      "goal-state"
    );
  }
}

export interface TrajectoryEvaluatorOptions extends LLMEvaluatorOptions {
  /** Every n-th step is shown to the judge (the last step always is). */
  stepSampleModulus?: number;
}

/** Judges a sample of the whole trajectory rather than only its end state. */
export class TrajectoryEvaluator extends LLMEvaluator {
  readonly stepSampleModulus: number;
  private sampledSteps = 0;

  constructor(backend: LLMBackend, options: TrajectoryEvaluatorOptions = {}) {
    super(backend, options, TRAJECTORY_TEMPLATE);
    this.stepSampleModulus = Math.max(1, options.stepSampleModulus ?? 5);
  }

  async evaluateEpisode(episode: Episode<ComputerObservation, Action>, mandate: string): Promise<EvaluationResult> {
    if (episode.numSteps === 0) return this.empty();
    const last = episode.numSteps - 1;
    const sampled: Array<{ index: number; action: string; reward: number; observation: string }> = [];
    let index = 0;
    for await (const step of episode.iterSteps()) {
      if (index % this.stepSampleModulus === 0 || index === last) {
        sampled.push({
          index,
          action: JSON.stringify(step.action),
          reward: step.reward,
          observation: describeObservation(step.observation),
        });
      }
      index++;
    }
    this.sampledSteps += sampled.length;
    return this.judge({ mandate, steps: episode.numSteps, sampled }, "trajectory");
  }

  protected extraMetrics(): Metrics {
    return { sampled_steps: this.sampledSteps };
  }
}

const thresholdMandateSchema = z
  .object({
    min_total_reward: z.number().optional(),
    max_steps: z.number().int().nonnegative().optional(),
  })
  .strict();

export type ThresholdMandate = z.infer<typeof thresholdMandateSchema>;

export function parseThresholdMandate(mandate: string): ThresholdMandate {
  let value: unknown;
  try {
    value = yaml.parse(mandate);
  } catch (error) {
    throw new ConfigError(`Mandate is not valid YAML or JSON: ${mandate}`, { cause: error });
  }
  const parsed = thresholdMandateSchema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid threshold mandate: ${parsed.error.issues[0]?.message}`, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Scores an episode against a structured mandate such as
 * `min_total_reward: 1` / `max_steps: 20`. Registered as a callback it also
 * counts the steps and reward it sees live.
 */
export class RewardThresholdEvaluator<O = ComputerObservation, A = Action>
  extends CountingEvaluator<O, A>
  implements Callback<O, A>
{
  private liveSteps = 0;
  private liveReward = 0;
  private observedSteps = 0;

  async evaluateEpisode(episode: Episode<O, A>, mandate: string): Promise<EvaluationResult> {
    const { min_total_reward: minReward, max_steps: maxSteps } = parseThresholdMandate(mandate);
    const total = episode.totalReward();
    const steps = episode.numSteps;

    const failures: string[] = [];
    if (minReward !== undefined && total < minReward) failures.push(`total reward ${total} is below ${minReward}`);
    if (maxSteps !== undefined && steps > maxSteps) failures.push(`took ${steps} steps, more than ${maxSteps}`);

    return this.record({
      success: failures.length === 0,
      reason: failures.length ? failures.join("; ") : "all thresholds met",
      score: total,
    });
  }

  /** Steps and reward seen through callbacks since the last episode start. */
  get live(): { steps: number; reward: number } {
    return { steps: this.liveSteps, reward: this.liveReward };
  }

  onEpisodeStart(): void {
    this.liveSteps = 0;
    this.liveReward = 0;
  }

  onStep(_observation: O, _action: A, reward: number, _info: Info, _done: boolean, _stepIndex: number): void {
    this.liveSteps++;
    this.liveReward += reward;
    this.observedSteps++;
  }

  protected extraMetrics(): Metrics {
    return { observed_steps: this.observedSteps };
  }
}
