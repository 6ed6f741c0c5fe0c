import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { isNotFound } from "./errors";
import type { FileChannel } from "./types";

/** File channel for the machine this process runs on: every copy is a local fs copy. */
export class LocalFileChannel implements FileChannel {
  readonly tempDir: string;

  constructor(tempDir = join(tmpdir(), "computer-gym")) {
    this.tempDir = tempDir;
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async copyFromComputer(remotePath: string, localPath: string): Promise<void> {
    await fs.copyFile(remotePath, localPath);
  }

  async copyToComputer(localPath: string, remotePath: string): Promise<void> {
    await fs.copyFile(localPath, remotePath);
  }

  async makeDirs(remoteDir: string): Promise<void> {
    await fs.mkdir(remoteDir, { recursive: true });
  }
}
