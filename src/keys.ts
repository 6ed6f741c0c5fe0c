/**
 * Canonical input vocabulary.
 *
 * These string values are the wire contract between the core, every backend
 * driver and any remote daemon. Backend tables are keyed by them.
 */

export enum KeyboardKey {
  ENTER = "enter",
  TAB = "tab",
  SPACE = "space",
  BACKSPACE = "backspace",
  DELETE = "delete",
  ESCAPE = "escape",
  HOME = "home",
  END = "end",
  PAGE_UP = "page_up",
  PAGE_DOWN = "page_down",

  UP = "up",
  DOWN = "down",
  LEFT = "left",
  RIGHT = "right",

  SHIFT = "shift",
  LEFT_SHIFT = "left_shift",
  RIGHT_SHIFT = "right_shift",
  CTRL = "ctrl",
  LEFT_CTRL = "left_ctrl",
  RIGHT_CTRL = "right_ctrl",
  ALT = "alt",
  LEFT_ALT = "left_alt",
  RIGHT_ALT = "right_alt",
  META = "meta",
  LEFT_META = "left_meta",
  RIGHT_META = "right_meta",

  F1 = "f1",
  F2 = "f2",
  F3 = "f3",
  F4 = "f4",
  F5 = "f5",
  F6 = "f6",
  F7 = "f7",
  F8 = "f8",
  F9 = "f9",
  F10 = "f10",
  F11 = "f11",
  F12 = "f12",

  A = "a",
  B = "b",
  C = "c",
  D = "d",
  E = "e",
  F = "f",
  G = "g",
  H = "h",
  I = "i",
  J = "j",
  K = "k",
  L = "l",
  M = "m",
  N = "n",
  O = "o",
  P = "p",
  Q = "q",
  R = "r",
  S = "s",
  T = "t",
  U = "u",
  V = "v",
  W = "w",
  X = "x",
  Y = "y",
  Z = "z",

  NUM_0 = "0",
  NUM_1 = "1",
  NUM_2 = "2",
  NUM_3 = "3",
  NUM_4 = "4",
  NUM_5 = "5",
  NUM_6 = "6",
  NUM_7 = "7",
  NUM_8 = "8",
  NUM_9 = "9",
}

export enum MouseButton {
  LEFT = "left",
  RIGHT = "right",
  MIDDLE = "middle",
}

export const KEYBOARD_KEYS: readonly KeyboardKey[] = Object.values(KeyboardKey);
export const MOUSE_BUTTONS: readonly MouseButton[] = Object.values(MouseButton);

const keyByValue = new Map<string, KeyboardKey>(KEYBOARD_KEYS.map((key) => [key, key]));
const buttonByValue = new Map<string, MouseButton>(MOUSE_BUTTONS.map((button) => [button, button]));

/**
 * Letters and digits. They map to every backend by literal value rather than
 * through a table.
 */
export function isCharacterKey(key: KeyboardKey): boolean {
  return /^[a-z0-9]$/.test(key);
}

/** Keys that every backend table is expected to cover. */
export const SPECIAL_KEYS: readonly KeyboardKey[] = KEYBOARD_KEYS.filter((key) => !isCharacterKey(key));

/** Trim and lower-case an untyped key name, then look it up. */
export function parseKeyboardKey(value: string): KeyboardKey | undefined {
  return keyByValue.get(value.trim().toLowerCase());
}

export function parseMouseButton(value: string): MouseButton | undefined {
  return buttonByValue.get(value.trim().toLowerCase());
}

/**
 * Normalize a single native character (e.g. "A" from a key event) to its
 * canonical key. Multi-character values are not characters.
 */
export function characterKey(value: string): KeyboardKey | undefined {
  if (value.length !== 1) return undefined;
  const key = keyByValue.get(value.toLowerCase());
  return key && isCharacterKey(key) ? key : undefined;
}
