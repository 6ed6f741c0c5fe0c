import { setTimeout as sleep } from "timers/promises";
import { NotFoundError, ResourceClosedError } from "./errors";
import type { ProcessChannel, ProcessInfo } from "./types";

export interface RemoteProcessOptions {
  /** How often `readOutput` re-polls an empty buffer. */
  pollIntervalMs?: number;
}

/**
 * A shell session on the computer behind a ProcessChannel. Launch and
 * terminate failures come back as `false`; channel errors propagate.
 * `cwd()` and `env()` query the remote side every time and record the
 * answer in `lastKnownCwd` / `lastKnownEnv`.
 */
export class RemoteProcess {
  readonly pollIntervalMs: number;
  lastKnownCwd?: string;
  lastKnownEnv?: Record<string, string>;
  private stopped = false;

  constructor(
    private readonly channel: ProcessChannel,
    readonly pid: number,
    readonly executable: string,
    options: RemoteProcessOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 50;
  }

  /** True after a successful `stop()`; no remote calls are made from then on. */
  get isStopped(): boolean {
    return this.stopped;
  }

  private async info(): Promise<ProcessInfo> {
    if (this.stopped) throw new ResourceClosedError(`Process ${this.pid}`);
    const info = await this.channel.getProcessInfo(this.pid);
    if (!info) throw new NotFoundError("process", String(this.pid));
    this.lastKnownCwd = info.cwd;
    this.lastKnownEnv = info.env;
    return info;
  }

  async cwd(): Promise<string> {
    return (await this.info()).cwd;
  }

  async env(): Promise<Record<string, string>> {
    return (await this.info()).env;
  }

  async start(): Promise<boolean> {
    const started = await this.channel.startProcess(this.pid);
    if (started) this.stopped = false;
    return started;
  }

  async stop(): Promise<boolean> {
    if (this.stopped) return true;
    const stopped = await this.channel.stopProcess(this.pid);
    if (stopped) this.stopped = true;
    return stopped;
  }

  /**
   * Buffered output, waiting up to `timeoutMs` (forever when omitted) for
   * something to arrive. Returns "" on timeout.
   */
  async readOutput(timeoutMs?: number): Promise<string> {
    const deadline = timeoutMs === undefined ? Infinity : Date.now() + timeoutMs;
    while (!this.stopped) {
      const output = await this.channel.readProcessOutput(this.pid);
      if (output) return output;
      const remaining = deadline - Date.now();
      if (remaining <= 0) break;
      await sleep(Math.min(this.pollIntervalMs, remaining));
    }
    return "";
  }

  async sendInput(text: string): Promise<boolean> {
    if (this.stopped) return false;
    return this.channel.sendProcessInput(this.pid, text);
  }
}
