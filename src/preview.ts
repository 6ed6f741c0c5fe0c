import type { LatestValueChannel, Versioned } from "./channel";
import { ResourceClosedError, TimeoutError } from "./errors";
import { logger } from "./logging";
import type { MaybePromise } from "./types";

export type PreviewSink<T> = (value: T, version: number) => MaybePromise<void>;

export interface PreviewStreamerOptions {
  /** Upper bound on how long `stop()` waits for the loop to notice. */
  pollTimeoutMs?: number;
}

/**
 * Background task that forwards each new value on a channel to a sink, for
 * example to serve live screenshots. It only reads the channel; the step
 * loop never waits on it.
 */
export class PreviewStreamer<T> {
  private running = false;
  private task?: Promise<void>;
  private failure?: unknown;
  private lastVersion = 0;
  private frames = 0;
  private readonly pollTimeoutMs: number;

  constructor(
    private readonly channel: LatestValueChannel<T>,
    private readonly sink: PreviewSink<T>,
    options: PreviewStreamerOptions = {}
  ) {
    this.pollTimeoutMs = options.pollTimeoutMs ?? 100;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Values handed to the sink so far. */
  get delivered(): number {
    return this.frames;
  }

  start(): void {
    if (this.task) return;
    this.running = true;
    this.task = this.loop()
      .catch((error: unknown) => {
        this.failure = error;
        logger.error("Preview sink failed; streamer stopped", error);
      })
      .finally(() => {
        this.running = false;
      });
  }

  /** Wait for the loop to exit. Re-raises the error that stopped it, if any. */
  async stop(): Promise<void> {
    this.running = false;
    const task = this.task;
    this.task = undefined;
    if (task) await task;
    const failure = this.failure;
    this.failure = undefined;
    if (failure !== undefined) throw failure;
  }

  private async loop(): Promise<void> {
    while (this.running) {
      let entry: Versioned<T>;
      try {
        entry = await this.channel.next({ after: this.lastVersion, timeoutMs: this.pollTimeoutMs });
      } catch (error) {
        if (error instanceof TimeoutError) continue;
        if (error instanceof ResourceClosedError) return;
        throw error;
      }
      if (!this.running) return;
      this.lastVersion = entry.version;
      await this.sink(entry.value, entry.version);
      this.frames++;
    }
  }
}
