import { promises as fs } from "fs";
import { join } from "path";
import { IndexOutOfRangeError, NotFoundError, TrajectoryCorruptionError, isNotFound } from "./errors";
import { STEP_EXTENSIONS, type StepCodec, type StepEncoding } from "./schemas";
import type { Action, ComputerObservation, Episode, Step } from "./types";

function checkIndex(index: number, size: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new IndexOutOfRangeError(index, size);
  }
}

function checkInsertIndex(index: number, size: number): void {
  if (!Number.isInteger(index) || index < 0 || index > size) {
    throw new IndexOutOfRangeError(index, size);
  }
}

abstract class BaseEpisode<O, A> implements Episode<O, A> {
  protected steps: Step<O, A>[] = [];

  get numSteps(): number {
    return this.steps.length;
  }

  abstract get(index: number): Promise<Step<O, A>>;
  abstract set(index: number, step: Step<O, A>): Promise<void>;
  abstract insert(step: Step<O, A>, index: number): Promise<void>;
  abstract pop(): Promise<Step<O, A>>;
  abstract remove(index: number): Promise<Step<O, A>>;
  abstract clear(): Promise<void>;

  async *iterSteps(): AsyncGenerator<Step<O, A>> {
    for (let i = 0; i < this.steps.length; i++) {
      yield await this.get(i);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<Step<O, A>> {
    return this.iterSteps();
  }

  async push(step: Step<O, A>): Promise<void> {
    await this.insert(step, this.steps.length);
  }

  totalReward(): number {
    return this.steps.reduce((sum, step) => sum + step.reward, 0);
  }
}

export class InMemoryEpisode<O = ComputerObservation, A = Action> extends BaseEpisode<O, A> {
  async get(index: number): Promise<Step<O, A>> {
    checkIndex(index, this.steps.length);
    return this.steps[index];
  }

  async set(index: number, step: Step<O, A>): Promise<void> {
    checkIndex(index, this.steps.length);
    this.steps[index] = step;
  }

  async push(step: Step<O, A>): Promise<void> {
    this.steps.push(step);
  }

  async insert(step: Step<O, A>, index: number): Promise<void> {
    checkInsertIndex(index, this.steps.length);
    this.steps.splice(index, 0, step);
  }

  async pop(): Promise<Step<O, A>> {
    const step = this.steps.pop();
    if (!step) throw new IndexOutOfRangeError(-1, 0);
    return step;
  }

  async remove(index: number): Promise<Step<O, A>> {
    checkIndex(index, this.steps.length);
    return this.steps.splice(index, 1)[0];
  }

  async clear(): Promise<void> {
    this.steps = [];
  }
}

/**
 * Durable episode: one file per step, named `step_<n><ext>` with n counting
 * from 1. Numbering stays contiguous; any insert or remove rewrites the tail.
 * Steps are also kept in memory so size and rewards need no disk access,
 * while `get` always reads the file back.
 */
export class FileEpisode<O = ComputerObservation, A = Action> extends BaseEpisode<O, A> {
  private readonly extension: string;
  private readonly pattern: RegExp;

  constructor(
    readonly dir: string,
    private readonly codec: StepCodec<O, A>,
    readonly encoding: StepEncoding = "json"
  ) {
    super();
    this.extension = STEP_EXTENSIONS[encoding];
    this.pattern = new RegExp(`^step_([1-9]\\d*)${this.extension.replace(".", "\\.")}$`);
  }

  /** Reload an episode written earlier; numbering must be exactly 1..N. */
  static async load<O, A>(
    dir: string,
    codec: StepCodec<O, A>,
    encoding: StepEncoding = "json"
  ): Promise<FileEpisode<O, A>> {
    const episode = new FileEpisode(dir, codec, encoding);
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (error) {
      if (isNotFound(error)) throw new NotFoundError("episode directory", dir);
      throw error;
    }

    const numbers = episode.stepNumbers(names).sort((a, b) => a - b);
    numbers.forEach((n, i) => {
      if (n !== i + 1) {
        throw new TrajectoryCorruptionError(dir, `expected ${episode.fileName(i)}, found ${episode.fileName(n - 1)}`);
      }
    });
    for (let i = 0; i < numbers.length; i++) {
      episode.steps.push(await episode.readStep(i));
    }
    return episode;
  }

  fileName(index: number): string {
    return `step_${index + 1}${this.extension}`;
  }

  private filePath(index: number): string {
    return join(this.dir, this.fileName(index));
  }

  private stepNumbers(names: string[]): number[] {
    const numbers: number[] = [];
    for (const name of names) {
      const match = this.pattern.exec(name);
      if (match?.[1]) numbers.push(Number(match[1]));
    }
    return numbers;
  }

  private async readStep(index: number): Promise<Step<O, A>> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(this.filePath(index));
    } catch (error) {
      if (isNotFound(error)) {
        throw new TrajectoryCorruptionError(this.dir, `missing ${this.fileName(index)}`, { cause: error });
      }
      throw error;
    }
    try {
      return this.codec.decode(bytes, this.encoding);
    } catch (error) {
      throw new TrajectoryCorruptionError(this.dir, `cannot decode ${this.fileName(index)}`, { cause: error });
    }
  }

  private async writeStep(index: number, step: Step<O, A>): Promise<void> {
    const path = this.filePath(index);
    await fs.mkdir(this.dir, { recursive: true });
    const tempPath = `${path}.tmp`;
    await fs.writeFile(tempPath, this.codec.encode(step, this.encoding));
    await fs.rename(tempPath, path);
  }

  /**
   * Make the files from `from` onward hold `next`, then adopt `next` as the
   * index. If any write or unlink fails, the files already touched are put
   * back so the directory still matches the current index.
   */
  private async replaceFrom(next: Step<O, A>[], from: number): Promise<void> {
    const touched: number[] = [];
    try {
      for (let i = from; i < next.length; i++) {
        await this.writeStep(i, next[i]);
        touched.push(i);
      }
      for (let i = next.length; i < this.steps.length; i++) {
        await fs.unlink(this.filePath(i));
        touched.push(i);
      }
    } catch (error) {
      await this.restore(touched, error);
      throw error;
    }
    this.steps = next;
  }

  private async restore(touched: number[], failure: unknown): Promise<void> {
    try {
      for (const i of touched) {
        if (i < this.steps.length) await this.writeStep(i, this.steps[i]);
        else await fs.rm(this.filePath(i), { force: true });
      }
    } catch (error) {
      throw new TrajectoryCorruptionError(this.dir, "step files left inconsistent after a failed write", {
        cause: new AggregateError([failure, error]),
      });
    }
  }

  async get(index: number): Promise<Step<O, A>> {
    checkIndex(index, this.steps.length);
    return this.readStep(index);
  }

  async set(index: number, step: Step<O, A>): Promise<void> {
    checkIndex(index, this.steps.length);
    await this.writeStep(index, step);
    this.steps[index] = step;
  }

  async insert(step: Step<O, A>, index: number): Promise<void> {
    checkInsertIndex(index, this.steps.length);
    const next = this.steps.slice();
    next.splice(index, 0, step);
    await this.replaceFrom(next, index);
  }

  async pop(): Promise<Step<O, A>> {
    const last = this.steps.length - 1;
    if (last < 0) throw new IndexOutOfRangeError(-1, 0);
    const step = await this.readStep(last);
    await fs.unlink(this.filePath(last));
    this.steps.pop();
    return step;
  }

  async remove(index: number): Promise<Step<O, A>> {
    checkIndex(index, this.steps.length);
    const step = await this.readStep(index);
    const next = this.steps.slice();
    next.splice(index, 1);
    await this.replaceFrom(next, index);
    return step;
  }

  /** Deletes this episode's step files only; other files in the directory stay. */
  async clear(): Promise<void> {
    this.steps = [];
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) return;
      throw error;
    }
    for (const name of names) {
      if (this.pattern.test(name)) await fs.unlink(join(this.dir, name));
    }
  }
}

/** Write any episode into `dir` as a durable episode, replacing step files already there. */
export async function persistEpisode<O, A>(
  source: Episode<O, A>,
  dir: string,
  codec: StepCodec<O, A>,
  encoding: StepEncoding = "json"
): Promise<FileEpisode<O, A>> {
  const target = new FileEpisode(dir, codec, encoding);
  await target.clear();
  for await (const step of source.iterSteps()) {
    await target.push(step);
  }
  return target;
}
