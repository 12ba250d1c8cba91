/**
 * PID-based lock file guarding one destination path against concurrent
 * installer runs. The owner's PID is written to the file so a lock left by
 * a dead process can be detected and removed.
 */

import { createHash } from "node:crypto";
import {
  closeSync,
  existsSync,
  openSync,
  readFileSync,
  unlinkSync,
  writeSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { isErrnoException } from "./errors.js";

const LOCK_RETRY_ATTEMPTS = 3;
const LOCK_RETRY_DELAY_MS = 100;

export type LockResult =
  | { success: true; path: string; release: () => void }
  | { success: false; reason: "busy" | "error"; error?: Error };

/**
 * Lock file location for a destination: one file per destination path in
 * the OS temp directory, so it never needs write access to the target.
 */
export const getLockPath = (destination: string, lockDir = tmpdir()): string => {
  const key = createHash("sha256").update(destination).digest("hex").slice(0, 16);
  return join(lockDir, `meldoc-install-${key}.lock`);
};

export const isProcessAlive = (pid: number): boolean => {
  try {
    // Signal 0 only checks for existence
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: exists, owned by someone else
    return isErrnoException(error) && error.code === "EPERM";
  }
};

export const readLockPid = (lockPath: string): number | undefined => {
  try {
    const content = readFileSync(lockPath, "utf-8").trim();
    const pid = Number.parseInt(content, 10);
    if (Number.isNaN(pid) || pid <= 0) {
      return undefined;
    }
    return pid;
  } catch {
    return undefined;
  }
};

const releaseLock = (lockPath: string): void => {
  try {
    unlinkSync(lockPath);
  } catch {
    // Already gone
  }
};

const sleep = (ms: number): void => {
  const end = Date.now() + ms;
  while (Date.now() < end) {
    // Short busy wait between retries
  }
};

/**
 * Tries to take the install lock for `destination`.
 * Returns { success: false, reason: "busy" } while a live process holds it.
 */
export const tryAcquireLock = (
  destination: string,
  lockDir?: string
): LockResult => {
  const lockPath = getLockPath(destination, lockDir);
  const ourPid = process.pid;
  const acquired = (): LockResult => ({
    success: true,
    path: lockPath,
    release: () => releaseLock(lockPath),
  });

  for (let attempt = 0; attempt < LOCK_RETRY_ATTEMPTS; attempt++) {
    if (existsSync(lockPath)) {
      const existingPid = readLockPid(lockPath);

      if (existingPid === ourPid) {
        return acquired();
      }
      if (existingPid !== undefined && isProcessAlive(existingPid)) {
        return { success: false, reason: "busy" };
      }

      // Stale or unreadable lock
      try {
        unlinkSync(lockPath);
      } catch {
        if (attempt < LOCK_RETRY_ATTEMPTS - 1) {
          sleep(LOCK_RETRY_DELAY_MS);
          continue;
        }
        return {
          success: false,
          reason: "error",
          error: new Error(`failed to remove stale lock ${lockPath}`),
        };
      }
    }

    try {
      // wx: O_CREAT | O_EXCL
      const fd = openSync(lockPath, "wx");
      writeSync(fd, String(ourPid));
      closeSync(fd);
      return acquired();
    } catch (error) {
      if (isErrnoException(error) && error.code === "EEXIST") {
        if (attempt < LOCK_RETRY_ATTEMPTS - 1) {
          sleep(LOCK_RETRY_DELAY_MS);
          continue;
        }
        return { success: false, reason: "busy" };
      }
      return {
        success: false,
        reason: "error",
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }

  return {
    success: false,
    reason: "error",
    error: new Error("lock acquisition failed after retries"),
  };
};
