import * as fs from "node:fs";
import * as path from "node:path";
import * as lockfile from "proper-lockfile";

import { ConfigError } from "../shared/errors.js";

/**
 * Exclusive lock on a project's output root for the length of one run, so two runs
 * never write the same module's output or build record at once.
 */
export class RunLock {
  private releaseFn: (() => Promise<void>) | null = null;

  constructor(private readonly lockPath: string) {}

  /**
   * @throws ConfigError if another run holds the lock.
   */
  async acquire(): Promise<void> {
    const dir = path.dirname(this.lockPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    // proper-lockfile locks an existing file
    if (!fs.existsSync(this.lockPath)) {
      fs.writeFileSync(this.lockPath, "", "utf-8");
    }

    try {
      this.releaseFn = await lockfile.lock(this.lockPath, {
        stale: 10000,
        update: 5000,
        retries: 0,
      });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ELOCKED") {
        throw new ConfigError(`Another stublayer run is in progress (lock: ${this.lockPath})`);
      }
      throw err;
    }
  }

  async release(): Promise<void> {
    if (!this.releaseFn) return;
    const release = this.releaseFn;
    this.releaseFn = null;
    await release();
  }
}

export async function withRunLock<T>(lockPath: string, run: () => Promise<T>): Promise<T> {
  const lock = new RunLock(lockPath);
  await lock.acquire();
  try {
    return await run();
  } finally {
    await lock.release();
  }
}
