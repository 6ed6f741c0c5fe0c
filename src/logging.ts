export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const PREFIX = "[computer-gym]";
const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(ORDER, value);
}

function parseLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : "warn";
}

let currentLevel: LogLevel = parseLevel(process.env.COMPUTER_GYM_LOG_LEVEL);
const warned = new Set<string>();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return ORDER[level] >= ORDER[currentLevel];
}

export const logger = {
  debug(message: string): void {
    if (enabled("debug")) console.log(`${PREFIX} ${message}`);
  },
  info(message: string): void {
    if (enabled("info")) console.log(`${PREFIX} ${message}`);
  },
  warn(message: string): void {
    if (enabled("warn")) console.warn(`${PREFIX} ${message}`);
  },
  error(message: string, error?: unknown): void {
    if (!enabled("error")) return;
    if (error === undefined) console.error(`${PREFIX} ${message}`);
    else console.error(`${PREFIX} ${message}`, error);
  },
};

export function warnOnce(key: string, message: string): void {
  if (warned.has(key)) return;
  warned.add(key);
  logger.warn(message);
}
