/**
 * Local-cache proxy for a file that lives on a (possibly remote) computer.
 *
 * All reads, writes and seeks act on a cache file in the channel's temp
 * directory. Writes mark the handle dirty; `flush` pushes the cache back
 * and clears the flag only when the copy succeeds. Two handles on the same
 * remote path are not coordinated: the last one flushed wins.
 */

import { createHash } from "crypto";
import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import { basename, dirname, join } from "path";
import { NotFoundError, ResourceClosedError, ResourceSyncError } from "./errors";
import { logger } from "./logging";
import type { FileChannel } from "./types";

type BaseMode = "r" | "r+" | "w" | "w+" | "a" | "a+";
export type FileMode = BaseMode | `${BaseMode}b`;

/** 0: from start, 1: from current position, 2: from end. */
export type Whence = 0 | 1 | 2;

interface ModeFlags {
  read: boolean;
  write: boolean;
  append: boolean;
  truncate: boolean;
}

const MODES: Record<BaseMode, ModeFlags> = {
  r: { read: true, write: false, append: false, truncate: false },
  "r+": { read: true, write: true, append: false, truncate: false },
  w: { read: false, write: true, append: false, truncate: true },
  "w+": { read: true, write: true, append: false, truncate: true },
  a: { read: false, write: true, append: true, truncate: false },
  "a+": { read: true, write: true, append: true, truncate: false },
};

function isBaseMode(value: string): value is BaseMode {
  return Object.hasOwn(MODES, value);
}

function parseMode(mode: string): ModeFlags {
  const base = mode.endsWith("b") ? mode.slice(0, -1) : mode;
  if (!isBaseMode(base)) throw new TypeError(`Invalid file mode: ${mode}`);
  return MODES[base];
}

/** Deterministic cache location: a digest of the full remote path plus its basename. */
export function cachePath(tempDir: string, remotePath: string): string {
  const digest = createHash("sha256").update(remotePath).digest("hex").slice(0, 16);
  return join(tempDir, `${digest}-${basename(remotePath)}`);
}

const CHUNK_SIZE = 4096;

/** Length of the UTF-8 sequence a lead byte starts; stray bytes count as one. */
function utf8Width(lead: number): number {
  if (lead < 0xc0) return 1;
  if (lead < 0xe0) return 2;
  if (lead < 0xf0) return 3;
  if (lead < 0xf8) return 4;
  return 1;
}

export class RemoteFile implements AsyncIterable<string> {
  private position: number;
  private modified = false;
  private isClosed = false;

  private constructor(
    private readonly channel: FileChannel,
    readonly remotePath: string,
    readonly mode: FileMode,
    readonly localPath: string,
    private readonly handle: FileHandle,
    private readonly flags: ModeFlags,
    initialPosition: number
  ) {
    this.position = initialPosition;
  }

  static async open(channel: FileChannel, remotePath: string, mode: FileMode = "r"): Promise<RemoteFile> {
    const flags = parseMode(mode);
    const localPath = cachePath(channel.tempDir, remotePath);
    await fs.mkdir(channel.tempDir, { recursive: true });

    let pulled = false;
    if (!flags.truncate) {
      try {
        if (await channel.exists(remotePath)) {
          await channel.copyFromComputer(remotePath, localPath);
          pulled = true;
        }
      } catch (error) {
        if (!flags.write) {
          throw new ResourceSyncError(`Failed to copy ${remotePath} from computer`, remotePath, { cause: error });
        }
        logger.warn(`Could not copy ${remotePath} from computer; starting from an empty file`);
      }
      if (!pulled && !flags.write) throw new NotFoundError("remote file", remotePath);
    }
    if (!pulled) await fs.writeFile(localPath, "");

    const handle = await fs.open(localPath, flags.write ? "r+" : "r");
    const initialPosition = flags.append ? (await handle.stat()).size : 0;
    return new RemoteFile(channel, remotePath, mode, localPath, handle, flags, initialPosition);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** True when local writes have not yet reached the computer. */
  get dirty(): boolean {
    return this.modified;
  }

  readable(): boolean {
    return this.flags.read;
  }

  writable(): boolean {
    return this.flags.write;
  }

  private ensureOpen(): void {
    if (this.isClosed) throw new ResourceClosedError(`Remote file ${this.remotePath}`);
  }

  private ensureReadable(): void {
    this.ensureOpen();
    if (!this.flags.read) throw new TypeError(`Remote file ${this.remotePath} is not open for reading`);
  }

  private ensureWritable(): void {
    this.ensureOpen();
    if (!this.flags.write) throw new TypeError(`Remote file ${this.remotePath} is not open for writing`);
  }

  private async size(): Promise<number> {
    return (await this.handle.stat()).size;
  }

  /** Read up to `size` bytes (all remaining bytes when omitted or negative). */
  async readBytes(size = -1): Promise<Buffer> {
    this.ensureReadable();
    const length = size < 0 ? Math.max(0, (await this.size()) - this.position) : size;
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await this.handle.read(buffer, 0, length, this.position);
    this.position += bytesRead;
    return buffer.subarray(0, bytesRead);
  }

  /**
   * Read up to `size` characters of UTF-8 text (all remaining text when
   * omitted or negative). A multi-byte character is never split.
   */
  async read(size = -1): Promise<string> {
    if (size < 0) return (await this.readBytes()).toString("utf-8");
    this.ensureReadable();
    const chunks: Buffer[] = [];
    let chars = 0;
    let pending = 0;
    let done = false;
    while (!done) {
      const chunk = Buffer.alloc(CHUNK_SIZE);
      const { bytesRead } = await this.handle.read(chunk, 0, CHUNK_SIZE, this.position);
      if (bytesRead === 0) break;
      let end = 0;
      for (; end < bytesRead; end++) {
        const byte = chunk[end];
        if (pending > 0 && (byte & 0xc0) === 0x80) {
          pending--;
          continue;
        }
        if (chars === size) {
          done = true;
          break;
        }
        chars++;
        pending = utf8Width(byte) - 1;
      }
      chunks.push(chunk.subarray(0, end));
      this.position += end;
    }
    return Buffer.concat(chunks).toString("utf-8");
  }

  /** Next line including its trailing newline; "" at end of file. */
  async readline(): Promise<string> {
    this.ensureReadable();
    const chunks: Buffer[] = [];
    for (;;) {
      const chunk = Buffer.alloc(CHUNK_SIZE);
      const { bytesRead } = await this.handle.read(chunk, 0, CHUNK_SIZE, this.position);
      if (bytesRead === 0) break;
      const newline = chunk.subarray(0, bytesRead).indexOf(0x0a);
      const end = newline === -1 ? bytesRead : newline + 1;
      chunks.push(chunk.subarray(0, end));
      this.position += end;
      if (newline !== -1) break;
    }
    return Buffer.concat(chunks).toString("utf-8");
  }

  async readlines(): Promise<string[]> {
    const lines: string[] = [];
    for await (const line of this) lines.push(line);
    return lines;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string> {
    for (let line = await this.readline(); line !== ""; line = await this.readline()) {
      yield line;
    }
  }

  /** Returns the number of bytes written. Append handles always write at the end. */
  async write(data: string | Uint8Array): Promise<number> {
    this.ensureWritable();
    const bytes = typeof data === "string" ? Buffer.from(data, "utf-8") : data;
    if (this.flags.append) this.position = await this.size();
    const { bytesWritten } = await this.handle.write(bytes, 0, bytes.length, this.position);
    this.position += bytesWritten;
    this.modified = true;
    return bytesWritten;
  }

  async writelines(lines: Iterable<string>): Promise<void> {
    for (const line of lines) await this.write(line);
  }

  async seek(offset: number, whence: Whence = 0): Promise<number> {
    this.ensureOpen();
    const base = whence === 0 ? 0 : whence === 1 ? this.position : await this.size();
    const target = base + offset;
    if (target < 0) throw new RangeError(`Negative seek position ${target}`);
    this.position = target;
    return target;
  }

  tell(): number {
    this.ensureOpen();
    return this.position;
  }

  /**
   * Push local changes to the computer. A failed copy raises
   * ResourceSyncError and leaves the handle dirty, so flush can be retried.
   */
  async flush(): Promise<void> {
    this.ensureOpen();
    if (!this.flags.write || !this.modified) return;
    try {
      await this.channel.makeDirs(dirname(this.remotePath));
      await this.channel.copyToComputer(this.localPath, this.remotePath);
    } catch (error) {
      throw new ResourceSyncError(`Failed to copy ${this.remotePath} to computer`, this.remotePath, { cause: error });
    }
    this.modified = false;
  }

  /** Flush, then release the cache handle. A no-op once closed; stays open if the flush fails. */
  async close(): Promise<void> {
    if (this.isClosed) return;
    await this.flush();
    await this.handle.close();
    this.isClosed = true;
  }

  /** Release the cache handle without syncing. The cache file is left in place. */
  async discard(): Promise<void> {
    if (this.isClosed) return;
    await this.handle.close();
    this.isClosed = true;
  }
}

/**
 * Open a remote file for the duration of `fn`. The handle is closed (and so
 * flushed) on every exit path; when that final flush fails the handle is
 * released anyway. The sync error is raised, unless `fn` already failed:
 * then `fn`'s error is raised and the sync error is logged.
 */
export async function withRemoteFile<T>(
  channel: FileChannel,
  remotePath: string,
  mode: FileMode,
  fn: (file: RemoteFile) => Promise<T>
): Promise<T> {
  const file = await RemoteFile.open(channel, remotePath, mode);
  let result: T;
  try {
    result = await fn(file);
  } catch (error) {
    try {
      await file.close();
    } catch (syncError) {
      await file.discard();
      logger.error(`Could not sync ${remotePath} after the callback failed`, syncError);
    }
    throw error;
  }
  try {
    await file.close();
  } catch (error) {
    await file.discard();
    throw error;
  }
  return result;
}
