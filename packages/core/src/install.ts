import { existsSync } from "node:fs";
import {
  chmod,
  copyFile,
  mkdir,
  rename,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  elevatedPowerShellArgs,
  quotePowerShell,
  type CommandRunner,
} from "./exec.js";
import { formatError, InstallFailedError } from "./errors.js";
import type { PlatformTag } from "./types.js";

export interface TargetDirStatus {
  readonly dir: string;
  readonly needsElevation: boolean;
}

export interface InstallBinaryOptions {
  readonly platform: PlatformTag;
  readonly elevated: boolean;
  readonly runner: CommandRunner;
}

const isWritable = async (dir: string, toolName: string): Promise<boolean> => {
  const probe = join(dir, `.${toolName}-write-test.${process.pid}`);
  try {
    await writeFile(probe, "");
    await rm(probe, { force: true });
    return true;
  } catch {
    return false;
  }
};

/**
 * Creates the target directory when possible and decides whether the copy
 * and rename need elevated rights. Only global installs may elevate.
 */
export const prepareTargetDir = async (
  dir: string,
  toolName: string,
  global: boolean
): Promise<TargetDirStatus> => {
  try {
    await mkdir(dir, { recursive: true });
  } catch {
    // Elevated install creates it later
  }

  if (await isWritable(dir, toolName)) {
    return { dir, needsElevation: false };
  }

  if (global) {
    return { dir, needsElevation: true };
  }

  throw new InstallFailedError(
    dir,
    "target directory is not writable (choose a directory under your home with --dir, or use --global)"
  );
};

export const isInstalledAt = async (destination: string): Promise<boolean> => {
  try {
    return (await stat(destination)).isFile();
  } catch {
    return false;
  }
};

export const temporaryDestination = (destination: string): string =>
  `${destination}.new.${process.pid}`;

const installDirect = async (
  source: string,
  destination: string,
  platform: PlatformTag
): Promise<void> => {
  const staged = temporaryDestination(destination);

  try {
    await mkdir(dirname(destination), { recursive: true });
    await copyFile(source, staged);
    if (platform.os !== "windows") {
      await chmod(staged, 0o755);
    }
    await rename(staged, destination);
  } catch (error) {
    await rm(staged, { force: true }).catch(() => undefined);
    throw new InstallFailedError(destination, formatError(error));
  }
};

const installWithSudo = async (
  source: string,
  destination: string,
  runner: CommandRunner
): Promise<void> => {
  const staged = temporaryDestination(destination);

  try {
    await runner.run("sudo", ["mkdir", "-p", dirname(destination)]);
    await runner.run("sudo", ["cp", source, staged]);
    await runner.run("sudo", ["chmod", "755", staged]);
    await runner.run("sudo", ["mv", "-f", staged, destination]);
  } catch (error) {
    if (existsSync(staged)) {
      await runner.run("sudo", ["rm", "-f", staged]).catch(() => undefined);
    }
    throw new InstallFailedError(
      destination,
      `elevated install failed: ${formatError(error)}`
    );
  }
};

const installWithRunAs = async (
  source: string,
  destination: string,
  runner: CommandRunner
): Promise<void> => {
  const staged = temporaryDestination(destination);
  const script = [
    `New-Item -ItemType Directory -Force -Path ${quotePowerShell(dirname(destination))} | Out-Null`,
    `Copy-Item -LiteralPath ${quotePowerShell(source)} -Destination ${quotePowerShell(staged)} -Force`,
    `Move-Item -LiteralPath ${quotePowerShell(staged)} -Destination ${quotePowerShell(destination)} -Force`,
  ].join("\n");

  try {
    await runner.run("powershell", elevatedPowerShellArgs(script));
  } catch (error) {
    throw new InstallFailedError(
      destination,
      `elevated install failed: ${formatError(error)}`
    );
  }
};

/**
 * Copies the binary next to its destination under a temporary name, marks
 * it executable and renames it over the destination. Readers of the old
 * binary see either the old or the new file, never a partial one.
 *
 * With `elevated`, only these three steps run privileged.
 */
export const installBinary = async (
  source: string,
  destination: string,
  options: InstallBinaryOptions
): Promise<void> => {
  const { platform, elevated, runner } = options;

  if (!elevated) {
    await installDirect(source, destination, platform);
    return;
  }

  if (platform.os === "windows") {
    await installWithRunAs(source, destination, runner);
  } else {
    await installWithSudo(source, destination, runner);
  }
};
