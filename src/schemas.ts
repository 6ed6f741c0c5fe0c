import { deserialize, serialize } from "v8";
import { z } from "zod";
import { KeyboardKey, MouseButton } from "./keys";
import type { Action, ComputerObservation, Info, Observation, Step } from "./types";

const keySchema = z.nativeEnum(KeyboardKey);
const buttonSchema = z.nativeEnum(MouseButton);
const pointSchema = z.object({ x: z.number(), y: z.number() });

export const actionSchema: z.ZodType<Action> = z.discriminatedUnion("type", [
  z.object({ type: z.literal("key_down"), key: keySchema }),
  z.object({ type: z.literal("key_up"), key: keySchema }),
  z.object({ type: z.literal("type_text"), text: z.string() }),
  z.object({
    type: z.literal("mouse_move"),
    x: z.number(),
    y: z.number(),
    duration: z.number().nonnegative().optional(),
  }),
  z.object({ type: z.literal("mouse_button_down"), button: buttonSchema }),
  z.object({ type: z.literal("mouse_button_up"), button: buttonSchema }),
  z.object({ type: z.literal("mouse_scroll"), delta: z.number() }),
]);

const screenshotSchema = z.object({
  type: z.literal("screenshot"),
  data: z.string(),
  format: z.enum(["png", "jpeg"]),
});
const mouseStateSchema = z.object({
  type: z.literal("mouse_state"),
  position: pointSchema,
  pressed: z.array(buttonSchema),
});
const keyboardStateSchema = z.object({
  type: z.literal("keyboard_state"),
  pressed: z.array(keySchema),
});

export const observationSchema: z.ZodType<Observation> = z.discriminatedUnion("type", [
  screenshotSchema,
  mouseStateSchema,
  keyboardStateSchema,
]);

export const computerObservationSchema: z.ZodType<ComputerObservation> = z.object({
  screenshot: screenshotSchema.optional(),
  mouseState: mouseStateSchema.optional(),
  keyboardState: keyboardStateSchema.optional(),
});

function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value) || ArrayBuffer.isView(value)) {
    return value;
  }
  Object.freeze(value);
  const children: unknown[] = Object.values(value);
  for (const child of children) deepFreeze(child);
  return value;
}

/**
 * Steps are immutable once created. The observation, action and info are
 * copied, so later changes to the caller's objects do not reach the step.
 */
export function createStep<O, A>(observation: O, action: A, reward = 0, info: Info = {}): Step<O, A> {
  return deepFreeze({
    observation: structuredClone(observation),
    action: structuredClone(action),
    reward,
    info: structuredClone(info),
  });
}

export type StepEncoding = "json" | "binary";

export const STEP_EXTENSIONS: Readonly<Record<StepEncoding, string>> = {
  json: ".json",
  binary: ".bin",
};

const stepEnvelopeSchema = z.object({
  observation: z.unknown(),
  action: z.unknown(),
  reward: z.number(),
  info: z.record(z.unknown()).optional(),
});

/**
 * Encodes steps for durable storage and validates them on the way back.
 * Observation and action payloads are checked against the given schemas.
 */
export class StepCodec<O = ComputerObservation, A = Action> {
  constructor(
    private readonly observation: z.ZodType<O>,
    private readonly action: z.ZodType<A>
  ) {}

  encode(step: Step<O, A>, encoding: StepEncoding): Buffer {
    const plain = { observation: step.observation, action: step.action, reward: step.reward, info: step.info };
    return encoding === "json" ? Buffer.from(JSON.stringify(plain, null, 2), "utf-8") : serialize(plain);
  }

  /** Throws (SyntaxError or ZodError) when the bytes are not a valid step. */
  decode(bytes: Buffer, encoding: StepEncoding): Step<O, A> {
    const value: unknown = encoding === "json" ? JSON.parse(bytes.toString("utf-8")) : deserialize(bytes);
    return this.validate(value);
  }

  validate(value: unknown): Step<O, A> {
    const envelope = stepEnvelopeSchema.parse(value);
    return createStep(
      this.observation.parse(envelope.observation),
      this.action.parse(envelope.action),
      envelope.reward,
      envelope.info ?? {}
    );
  }
}

export const computerStepCodec = new StepCodec(computerObservationSchema, actionSchema);
