/**
 * Error taxonomy.
 *
 * Mapping misses are never errors: they are logged and resolved to a default
 * (see mapping.ts). Everything touching durable or remote state surfaces here.
 */

/** A copy between the local cache and the remote computer failed. */
export class ResourceSyncError extends Error {
  readonly remotePath: string;

  constructor(message: string, remotePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResourceSyncError";
    this.remotePath = remotePath;
  }
}

export class IndexOutOfRangeError extends Error {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number, what = "step") {
    super(`${what} index ${index} out of range (size ${size})`);
    this.name = "IndexOutOfRangeError";
    this.index = index;
    this.size = size;
  }
}

/** Keyed input to an agent pool does not match the pool's agent ids. */
export class KeyMismatchError extends Error {
  readonly expected: string[];
  readonly received: string[];

  constructor(kind: string, expected: Iterable<string>, received: Iterable<string>) {
    const exp = [...expected].sort();
    const rec = [...received].sort();
    super(`${kind} keys [${rec.join(", ")}] don't match agent keys [${exp.join(", ")}]`);
    this.name = "KeyMismatchError";
    this.expected = exp;
    this.received = rec;
  }
}

export class NotFoundError extends Error {
  readonly kind: string;
  readonly id: string;

  constructor(kind: string, id: string) {
    super(`No ${kind} found with ID: ${id}`);
    this.name = "NotFoundError";
    this.kind = kind;
    this.id = id;
  }
}

/** The backend reported that an action did not execute. */
export class ActionExecutionFailure extends Error {
  readonly action: unknown;

  constructor(action: unknown, options?: { cause?: unknown }) {
    super(`Action ${JSON.stringify(action)} failed to execute`, options);
    this.name = "ActionExecutionFailure";
    this.action = action;
  }
}

/** Persisted steps have gaps, are missing or cannot be decoded. */
export class TrajectoryCorruptionError extends Error {
  readonly dir: string;

  constructor(dir: string, detail: string, options?: { cause?: unknown }) {
    super(`Corrupt episode in ${dir}: ${detail}`, options);
    this.name = "TrajectoryCorruptionError";
    this.dir = dir;
  }
}

export class EnvironmentStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EnvironmentStateError";
  }
}

export class ResourceClosedError extends Error {
  constructor(what: string) {
    super(`${what} is closed`);
    this.name = "ResourceClosedError";
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

export class EvaluationParseError extends Error {
  readonly response: string;

  constructor(response: string) {
    super(`Could not parse evaluation verdict from: ${response.slice(0, 200)}`);
    this.name = "EvaluationParseError";
    this.response = response;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** True for a Node fs error whose code is ENOENT. */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
