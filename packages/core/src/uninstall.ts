import { type Dirent } from "node:fs";
import { readdir, rm, stat, unlink } from "node:fs/promises";
import { join } from "node:path";
import {
  elevatedPowerShellArgs,
  probeInstalledVersion,
  quotePowerShell,
  type CommandRunner,
} from "./exec.js";
import {
  formatError,
  isErrnoException,
  UninstallFailedError,
} from "./errors.js";
import { getCommonInstallDirs, pathApi } from "./paths.js";
import { getBinaryName } from "./platform.js";
import type { Environment, PlatformTag } from "./types.js";

const DEFAULT_STATE_DEPTH = 5;

export interface Installation {
  readonly path: string;
  /** First line of `<binary> version`, or "unknown" */
  readonly version: string;
  readonly foundOnPath: boolean;
}

export interface FindInstallationOptions {
  readonly pathValue: string | undefined;
  readonly platform: PlatformTag;
  readonly home: string;
  readonly env: Environment;
  /** Injected for tests; defaults to running `<binary> version` */
  readonly probeVersion?: (binaryPath: string) => Promise<string>;
}

export interface RemoveBinaryOptions {
  readonly platform: PlatformTag;
  readonly runner: CommandRunner;
}

const isFile = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
};

/**
 * First match for `binaryName` in the lookup path, like `which`.
 */
export const findOnPath = async (
  binaryName: string,
  pathValue: string | undefined,
  platform: PlatformTag
): Promise<string | undefined> => {
  if (!pathValue) {
    return undefined;
  }
  const path = pathApi(platform);
  const entries = pathValue
    .split(platform.os === "windows" ? ";" : ":")
    .filter((entry) => entry.length > 0);

  for (const entry of entries) {
    const candidate = path.join(entry, binaryName);
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
};

export const findInstallation = async (
  toolName: string,
  options: FindInstallationOptions
): Promise<Installation | undefined> => {
  const { platform, pathValue } = options;
  const binaryName = getBinaryName(toolName, platform);
  const probe = options.probeVersion ?? probeInstalledVersion;

  const onPath = await findOnPath(binaryName, pathValue, platform);
  if (onPath) {
    return { path: onPath, version: await probe(onPath), foundOnPath: true };
  }

  const path = pathApi(platform);
  for (const dir of getCommonInstallDirs(toolName, options)) {
    const candidate = path.join(dir, binaryName);
    if (await isFile(candidate)) {
      return { path: candidate, version: await probe(candidate), foundOnPath: false };
    }
  }
  return undefined;
};

const isPermissionError = (error: unknown): boolean =>
  isErrnoException(error) && (error.code === "EACCES" || error.code === "EPERM");

/**
 * Deletes the installed binary. Permission errors are retried once with
 * elevated rights (sudo, or an elevated PowerShell on Windows).
 */
export const removeBinary = async (
  binaryPath: string,
  options: RemoveBinaryOptions
): Promise<{ elevated: boolean }> => {
  try {
    await unlink(binaryPath);
    return { elevated: false };
  } catch (error) {
    if (!isPermissionError(error)) {
      throw new UninstallFailedError(binaryPath, formatError(error));
    }
  }

  try {
    if (options.platform.os === "windows") {
      await options.runner.run(
        "powershell",
        elevatedPowerShellArgs(
          `Remove-Item -LiteralPath ${quotePowerShell(binaryPath)} -Force`
        )
      );
    } else {
      await options.runner.run("sudo", ["rm", "-f", binaryPath]);
    }
    return { elevated: true };
  } catch (error) {
    throw new UninstallFailedError(
      binaryPath,
      `elevated removal failed: ${formatError(error)}`
    );
  }
};

/**
 * Directories named `name` below `root`, at most `maxDepth` levels deep.
 * Symbolic links are not followed and unreadable directories are skipped.
 * A match is not searched further, since removing it removes its contents.
 */
export const findStateDirs = async (
  root: string,
  name: string,
  maxDepth = DEFAULT_STATE_DEPTH
): Promise<string[]> => {
  const found: string[] = [];

  const walk = async (dir: string, depth: number): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch {
      return;
    }

    for (const entry of entries) {
      if (!entry.isDirectory()) {
        continue;
      }
      const child = join(dir, entry.name);
      if (entry.name === name) {
        found.push(child);
      } else if (depth < maxDepth) {
        await walk(child, depth + 1);
      }
    }
  };

  await walk(root, 1);
  return found.sort();
};

export interface StateRemovalResult {
  readonly removed: string[];
  readonly failed: { path: string; reason: string }[];
}

export const removeStateDirs = async (
  dirs: readonly string[]
): Promise<StateRemovalResult> => {
  const removed: string[] = [];
  const failed: { path: string; reason: string }[] = [];

  for (const dir of dirs) {
    try {
      await rm(dir, { recursive: true, force: true });
      removed.push(dir);
    } catch (error) {
      failed.push({ path: dir, reason: formatError(error) });
    }
  }
  return { removed, failed };
};
