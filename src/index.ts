/**
 * computer-gym
 * Canonical computer-use actions and observations, remote resource proxies,
 * durable trajectories and rollout drivers.
 */

export const VERSION = "0.1.0";

export * from "./types";
export * from "./errors";
export { logger, setLogLevel, getLogLevel, warnOnce, type LogLevel } from "./logging";

export {
  KeyboardKey,
  MouseButton,
  KEYBOARD_KEYS,
  MOUSE_BUTTONS,
  SPECIAL_KEYS,
  isCharacterKey,
  parseKeyboardKey,
  parseMouseButton,
  characterKey,
} from "./keys";
export {
  type BackendMapping,
  type BackendTable,
  type NativeButton,
  DEFAULT_KEY,
  DEFAULT_BUTTON,
  backendTableSchema,
  defineMapping,
  keyToBackend,
  keyFromBackend,
  buttonToBackend,
  buttonFromBackend,
  missingEntries,
  registerMapping,
  getMapping,
  listMappings,
} from "./mapping";

export {
  actionSchema,
  observationSchema,
  computerObservationSchema,
  createStep,
  StepCodec,
  computerStepCodec,
  STEP_EXTENSIONS,
  type StepEncoding,
} from "./schemas";
export { InMemoryEpisode, FileEpisode, persistEpisode } from "./episode";

export { RemoteFile, withRemoteFile, cachePath, type FileMode, type Whence } from "./remote_file";
export { RemoteProcess, type RemoteProcessOptions } from "./remote_process";
export { LocalFileChannel } from "./local_channel";

export {
  Environment,
  ComputerEnvironment,
  ALL_OBSERVATIONS,
  type EnvironmentState,
  type EnvironmentOptions,
  type ComputerEnvironmentOptions,
  type RewardFn,
  type DoneFn,
} from "./environment";
export {
  AgentPool,
  RandomAgent,
  ReplayAgent,
  ACTION_TYPES,
  type AgentFactory,
  type AgentPoolOptions,
  type RandomAgentOptions,
} from "./agents";
export {
  Driver,
  PoolDriver,
  DEFAULT_MAX_STEPS,
  type DriverOptions,
  type EpisodeFactory,
  type EpisodeResult,
  type RunEpisodeOptions,
} from "./driver";

export { CallbackBus, WebhookCallback, type CallbackBusOptions, type WebhookCallbackOptions } from "./callbacks";
export {
  parseVerdict,
  parseThresholdMandate,
  GoalStateEvaluator,
  TrajectoryEvaluator,
  RewardThresholdEvaluator,
  JUDGE_SYSTEM_PROMPT,
  GOAL_STATE_TEMPLATE,
  TRAJECTORY_TEMPLATE,
  type LLMEvaluatorOptions,
  type TrajectoryEvaluatorOptions,
  type ThresholdMandate,
} from "./evaluators";
export * from "./llm";

export { LatestValueChannel, type Versioned, type NextOptions } from "./channel";
export { PreviewStreamer, type PreviewSink, type PreviewStreamerOptions } from "./preview";
export { elideScreenshot, describeObservation } from "./summary";
export { renderTemplate } from "./templating";

export {
  CONFIG_SPEC,
  configDataSchema,
  parseConfig,
  loadConfig,
  mappingFor,
  createEpisodeFactory,
  createCallbackBus,
  createDriverOptions,
  createEnvironment,
  createRemoteProcess,
  createEvaluatorBackend,
  createEvaluator,
  evaluatorLLMOptions,
  type GymConfig,
  type LLMEvaluatorKind,
} from "./config";
