/**
 * Backend mapping tables.
 *
 * A table is pure data keyed by canonical values. Translation is done by the
 * total forward functions (`keyToBackend`, `buttonToBackend`) and the partial
 * inverse functions (`keyFromBackend`, `buttonFromBackend`). Adding a backend
 * means registering one table.
 */

import { z } from "zod";
import builtinTables from "./backends.json";
import { ConfigError, NotFoundError } from "./errors";
import {
  KeyboardKey,
  MouseButton,
  MOUSE_BUTTONS,
  SPECIAL_KEYS,
  characterKey,
  isCharacterKey,
  parseKeyboardKey,
  parseMouseButton,
} from "./keys";
import { logger } from "./logging";

export type NativeButton = string | number;

/** Fallbacks used when a forward lookup misses. */
export const DEFAULT_KEY = KeyboardKey.ENTER;
export const DEFAULT_BUTTON = MouseButton.LEFT;

export interface BackendMapping {
  readonly name: string;
  /** Native values are the canonical values themselves. */
  readonly passthrough: boolean;
  readonly keys: Readonly<Partial<Record<KeyboardKey, string>>>;
  readonly buttons: Readonly<Partial<Record<MouseButton, NativeButton>>>;
  /** Extra native spellings accepted by the inverse only. */
  readonly keyAliases: ReadonlyMap<string, KeyboardKey>;
  readonly buttonAliases: ReadonlyMap<string, MouseButton>;
}

export const backendTableSchema = z.object({
  passthrough: z.boolean().optional(),
  keys: z.record(z.nativeEnum(KeyboardKey), z.string().min(1)),
  buttons: z.record(z.nativeEnum(MouseButton), z.union([z.string().min(1), z.number().int()])),
  key_aliases: z.record(z.string(), z.nativeEnum(KeyboardKey)).optional(),
  button_aliases: z.record(z.string(), z.nativeEnum(MouseButton)).optional(),
});

export type BackendTable = z.input<typeof backendTableSchema>;

/** Validate a table (as stored in JSON/YAML) and turn it into a mapping. */
export function defineMapping(name: string, table: unknown): BackendMapping {
  const parsed = backendTableSchema.safeParse(table);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "(root)";
    throw new ConfigError(`Invalid mapping table '${name}' at ${where}: ${issue?.message}`, {
      cause: parsed.error,
    });
  }
  const data = parsed.data;
  return {
    name,
    passthrough: data.passthrough ?? false,
    keys: data.keys,
    buttons: data.buttons,
    keyAliases: new Map(Object.entries(data.key_aliases ?? {})),
    buttonAliases: new Map(Object.entries(data.button_aliases ?? {})),
  };
}

// ---------------------------------------------------------------------------
// Inverse tables
// ---------------------------------------------------------------------------

// null marks a native value that several canonical values share.
interface InverseTables {
  keys: Map<string, KeyboardKey | null>;
  buttons: Map<NativeButton, MouseButton | null>;
}

const inverseCache = new WeakMap<BackendMapping, InverseTables>();

function invert<C, N>(entries: Array<[C, N | undefined]>): Map<N, C | null> {
  const inverse = new Map<N, C | null>();
  for (const [canonical, native] of entries) {
    if (native === undefined) continue;
    inverse.set(native, inverse.has(native) ? null : canonical);
  }
  return inverse;
}

function inverseOf(mapping: BackendMapping): InverseTables {
  let tables = inverseCache.get(mapping);
  if (!tables) {
    tables = {
      keys: invert(SPECIAL_KEYS.map((key): [KeyboardKey, string | undefined] => [key, mapping.keys[key]])),
      buttons: invert(MOUSE_BUTTONS.map((button): [MouseButton, NativeButton | undefined] => [button, mapping.buttons[button]])),
    };
    inverseCache.set(mapping, tables);
  }
  return tables;
}

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------

/**
 * Canonical key to backend-native name. Never throws: unknown input or a key
 * missing from the table logs a warning and resolves to the native ENTER.
 */
export function keyToBackend(key: KeyboardKey | string, mapping: BackendMapping): string {
  const canonical = parseKeyboardKey(key);
  if (canonical !== undefined) {
    if (isCharacterKey(canonical) || mapping.passthrough) return canonical;
    const native = mapping.keys[canonical];
    if (native !== undefined) return native;
  }
  logger.warn(`Key '${key}' has no mapping for backend '${mapping.name}', using '${DEFAULT_KEY}'`);
  return mapping.passthrough ? DEFAULT_KEY : mapping.keys[DEFAULT_KEY] ?? DEFAULT_KEY;
}

/**
 * Backend-native key name to canonical key, or undefined when the backend value
 * has no canonical counterpart or is shared by several canonical keys.
 */
export function keyFromBackend(native: string, mapping: BackendMapping): KeyboardKey | undefined {
  const character = characterKey(native);
  if (character !== undefined) return character;
  if (mapping.passthrough) return parseKeyboardKey(native);

  const hit = inverseOf(mapping).keys.get(native);
  if (hit !== undefined) return hit ?? undefined;
  return mapping.keyAliases.get(native);
}

// ---------------------------------------------------------------------------
// Buttons
// ---------------------------------------------------------------------------

export function buttonToBackend(button: MouseButton | string, mapping: BackendMapping): NativeButton {
  const canonical = parseMouseButton(button);
  if (canonical !== undefined) {
    if (mapping.passthrough) return canonical;
    const native = mapping.buttons[canonical];
    if (native !== undefined) return native;
  }
  logger.warn(`Button '${button}' has no mapping for backend '${mapping.name}', using '${DEFAULT_BUTTON}'`);
  return mapping.passthrough ? DEFAULT_BUTTON : mapping.buttons[DEFAULT_BUTTON] ?? DEFAULT_BUTTON;
}

export function buttonFromBackend(native: NativeButton, mapping: BackendMapping): MouseButton | undefined {
  if (mapping.passthrough) return typeof native === "string" ? parseMouseButton(native) : undefined;

  const hit = inverseOf(mapping).buttons.get(native);
  if (hit !== undefined) return hit ?? undefined;
  return typeof native === "string" ? mapping.buttonAliases.get(native) : undefined;
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

const registry = new Map<string, BackendMapping>();

/** Canonical values a table does not cover (always empty for passthrough tables). */
export function missingEntries(mapping: BackendMapping): { keys: KeyboardKey[]; buttons: MouseButton[] } {
  if (mapping.passthrough) return { keys: [], buttons: [] };
  return {
    keys: SPECIAL_KEYS.filter((key) => mapping.keys[key] === undefined),
    buttons: MOUSE_BUTTONS.filter((button) => mapping.buttons[button] === undefined),
  };
}

/** Register a mapping under its name, replacing any previous table. */
export function registerMapping(mapping: BackendMapping): void {
  const missing = missingEntries(mapping);
  if (missing.keys.length || missing.buttons.length) {
    logger.warn(
      `Mapping '${mapping.name}' is partial; missing keys [${missing.keys.join(", ")}], buttons [${missing.buttons.join(", ")}]`
    );
  }
  registry.set(mapping.name, mapping);
}

export function getMapping(name: string): BackendMapping {
  const mapping = registry.get(name);
  if (!mapping) throw new NotFoundError("backend mapping", name);
  return mapping;
}

export function listMappings(): string[] {
  return [...registry.keys()];
}

for (const [name, table] of Object.entries(builtinTables)) {
  registerMapping(defineMapping(name, table));
}
