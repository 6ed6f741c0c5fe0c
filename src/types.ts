/**
 * Core types shared across the gym.
 *
 * Actions and observations speak only the canonical vocabulary from keys.ts;
 * backend-native values live behind ComputerBackend and the mapping tables.
 */

import type { KeyboardKey, MouseButton } from "./keys";
import type { BackendMapping, NativeButton } from "./mapping";

export type MaybePromise<T> = T | Promise<T>;

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export interface KeyDownAction {
  type: "key_down";
  key: KeyboardKey;
}

export interface KeyUpAction {
  type: "key_up";
  key: KeyboardKey;
}

export interface TypeTextAction {
  type: "type_text";
  text: string;
}

export interface MouseMoveAction {
  type: "mouse_move";
  x: number;
  y: number;
  /** Milliseconds the pointer takes to travel; backends may ignore it. */
  duration?: number;
}

export interface MouseButtonDownAction {
  type: "mouse_button_down";
  button: MouseButton;
}

export interface MouseButtonUpAction {
  type: "mouse_button_up";
  button: MouseButton;
}

export interface MouseScrollAction {
  type: "mouse_scroll";
  delta: number;
}

export type Action =
  | KeyDownAction
  | KeyUpAction
  | TypeTextAction
  | MouseMoveAction
  | MouseButtonDownAction
  | MouseButtonUpAction
  | MouseScrollAction;

export type ActionType = Action["type"];

// ---------------------------------------------------------------------------
// Observations
// ---------------------------------------------------------------------------

export interface Point {
  x: number;
  y: number;
}

export type ImageFormat = "png" | "jpeg";

export interface ScreenshotObservation {
  type: "screenshot";
  /** Base64-encoded image bytes. */
  data: string;
  format: ImageFormat;
}

export interface MouseStateObservation {
  type: "mouse_state";
  position: Point;
  pressed: MouseButton[];
}

export interface KeyboardStateObservation {
  type: "keyboard_state";
  pressed: KeyboardKey[];
}

export type Observation = ScreenshotObservation | MouseStateObservation | KeyboardStateObservation;

export type ObservationType = Observation["type"];

/** One entry per observation kind the environment is configured to collect. */
export interface ComputerObservation {
  screenshot?: ScreenshotObservation;
  mouseState?: MouseStateObservation;
  keyboardState?: KeyboardStateObservation;
}

// ---------------------------------------------------------------------------
// Steps and episodes
// ---------------------------------------------------------------------------

export type Info = Record<string, unknown>;

export interface Step<O = ComputerObservation, A = Action> {
  readonly observation: O;
  readonly action: A;
  readonly reward: number;
  readonly info: Readonly<Info>;
}

export interface StepResult<O = ComputerObservation> {
  observation: O;
  reward: number;
  done: boolean;
  info: Info;
}

/**
 * Ordered record of one rollout. Both the in-memory and the file-backed
 * strategies implement this; indices are 0-based.
 */
export interface Episode<O = ComputerObservation, A = Action> {
  readonly numSteps: number;
  iterSteps(): AsyncGenerator<Step<O, A>>;
  get(index: number): Promise<Step<O, A>>;
  set(index: number, step: Step<O, A>): Promise<void>;
  push(step: Step<O, A>): Promise<void>;
  insert(step: Step<O, A>, index: number): Promise<void>;
  pop(): Promise<Step<O, A>>;
  remove(index: number): Promise<Step<O, A>>;
  clear(): Promise<void>;
  totalReward(): number;
  [Symbol.asyncIterator](): AsyncIterator<Step<O, A>>;
}

// ---------------------------------------------------------------------------
// Agents, callbacks, evaluators
// ---------------------------------------------------------------------------

export interface Agent<O = ComputerObservation, A = Action> {
  reset(): MaybePromise<void>;
  act(observation: O): MaybePromise<A>;
  update(reward: number): MaybePromise<void>;
}

export interface Callback<O = ComputerObservation, A = Action> {
  onEpisodeStart?(): MaybePromise<void>;
  onStep?(observation: O, action: A, reward: number, info: Info, done: boolean, stepIndex: number): MaybePromise<void>;
  onEpisodeEnd?(episodeName?: string): MaybePromise<void>;
}

export interface EvaluationResult {
  success: boolean;
  reason: string;
  score?: number;
}

export type Metrics = Record<string, number>;

export interface Evaluator<O = ComputerObservation, A = Action> {
  evaluateEpisode(episode: Episode<O, A>, mandate: string): Promise<EvaluationResult>;
  getMetrics(): Metrics;
}

// ---------------------------------------------------------------------------
// Computer capabilities
// ---------------------------------------------------------------------------

/** Copy primitives supplied by the computer that owns a remote file. */
export interface FileChannel {
  /** Local directory for cache files. */
  readonly tempDir: string;
  exists(remotePath: string): Promise<boolean>;
  copyFromComputer(remotePath: string, localPath: string): Promise<void>;
  copyToComputer(localPath: string, remotePath: string): Promise<void>;
  makeDirs(remoteDir: string): Promise<void>;
}

export interface ProcessInfo {
  cwd: string;
  env: Record<string, string>;
}

/** Shell-session primitives supplied by the computer that owns a process. */
export interface ProcessChannel {
  startProcess(pid: number): Promise<boolean>;
  stopProcess(pid: number): Promise<boolean>;
  /** Drain whatever output is buffered right now; "" when nothing is. */
  readProcessOutput(pid: number): Promise<string>;
  sendProcessInput(pid: number, text: string): Promise<boolean>;
  getProcessInfo(pid: number): Promise<ProcessInfo | undefined>;
}

export interface RawScreenshot {
  data: string;
  format: ImageFormat;
}

export interface RawMouseState {
  position: Point;
  pressed: NativeButton[];
}

/**
 * A concrete driver. Values crossing this interface are backend-native; the
 * environment translates them through `mapping`. The inject* methods report
 * whether the input was delivered.
 */
export interface ComputerBackend {
  readonly mapping: BackendMapping;
  captureScreenshot(): Promise<RawScreenshot>;
  getMouseState(): Promise<RawMouseState>;
  /** Native names of the keys currently held. */
  getKeyboardState(): Promise<string[]>;
  injectKey(key: string, down: boolean): Promise<boolean>;
  injectText(text: string): Promise<boolean>;
  injectMouseMove(x: number, y: number, durationMs?: number): Promise<boolean>;
  injectMouseButton(button: NativeButton, down: boolean): Promise<boolean>;
  injectScroll(delta: number): Promise<boolean>;
  close?(): Promise<void>;
}
