import { appendFile, readFile, stat } from "node:fs/promises";
import { posix } from "node:path";
import {
  elevatedPowerShellArgs,
  quotePowerShell,
  type CommandRunner,
} from "./exec.js";
import { formatError, PathIntegrationFailedError } from "./errors.js";
import type {
  Environment,
  OperatingSystem,
  PathIntegrationResult,
  PathScope,
  PlatformStrategy,
  PlatformTag,
} from "./types.js";

/**
 * Shell startup files, in the order they are preferred.
 */
export const SHELL_RC_CANDIDATES = [
  ".zshrc",
  ".bashrc",
  ".bash_profile",
  ".config/fish/config.fish",
] as const;

/**
 * Persistent PATH storage on Windows (the user or machine environment).
 */
export interface PathStore {
  read(scope: PathScope): Promise<string>;
  write(scope: PathScope, value: string): Promise<void>;
}

export interface PathIntegrationOptions {
  readonly dir: string;
  readonly toolName: string;
  readonly platform: PlatformTag;
  readonly strategy: PlatformStrategy;
  /** The current lookup path, see getPathValue */
  readonly pathValue: string | undefined;
  readonly home: string;
  readonly global: boolean;
  readonly setupPath?: boolean;
  readonly pathHint: boolean;
  readonly pathStore: PathStore;
}

export const getPathValue = (env: Environment): string | undefined =>
  env.PATH ?? env.Path;

const trimTrailing = (entry: string, separators: RegExp): string => {
  const trimmed = entry.replace(separators, "");
  return trimmed || entry;
};

const normalizeEntry = (entry: string, os: OperatingSystem): string =>
  os === "windows"
    ? trimTrailing(entry.trim(), /[\\/]+$/).toLowerCase()
    : trimTrailing(entry, /\/+$/);

const containsEntry = (
  pathValue: string,
  dir: string,
  os: OperatingSystem
): boolean => {
  const wanted = normalizeEntry(dir, os);
  return pathValue
    .split(os === "windows" ? ";" : ":")
    .filter((entry) => entry.length > 0)
    .some((entry) => normalizeEntry(entry, os) === wanted);
};

/**
 * Whether `dir` is an entry of the lookup path. Trailing separators are
 * ignored; Windows entries compare case-insensitively.
 */
export const isOnPath = (
  dir: string,
  pathValue: string | undefined,
  platform: PlatformTag
): boolean => (pathValue ? containsEntry(pathValue, dir, platform.os) : false);

const fileExists = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
};

export const findShellRc = async (home: string): Promise<string | undefined> => {
  for (const candidate of SHELL_RC_CANDIDATES) {
    const path = posix.join(home, candidate);
    if (await fileExists(path)) {
      return path;
    }
  }
  return undefined;
};

const isFishConfig = (rcPath: string): boolean => rcPath.endsWith("config.fish");

export const shellExportLine = (dir: string, rcPath?: string): string =>
  rcPath && isFishConfig(rcPath)
    ? `fish_add_path ${dir}`
    : `export PATH="${dir}:$PATH"`;

export const unixManualCommands = (dir: string, rcPath?: string): string[] => {
  const line = shellExportLine(dir, rcPath);
  if (!rcPath) {
    return [line];
  }
  if (isFishConfig(rcPath)) {
    return [`echo '${line}' >> ${rcPath}`];
  }
  return [`echo '${line}' >> ${rcPath} && source ${rcPath}`];
};

export const windowsManualCommands = (dir: string, scope: PathScope): string[] => [
  `[Environment]::SetEnvironmentVariable('Path', [Environment]::GetEnvironmentVariable('Path', '${scope}') + ';${dir.replaceAll("'", "''")}', '${scope}')`,
];

/**
 * Appends the PATH line to a shell startup file unless the directory
 * already appears anywhere in it.
 */
export const appendToShellRc = async (
  rcPath: string,
  dir: string,
  toolName: string
): Promise<boolean> => {
  const content = await readFile(rcPath, "utf-8");
  if (content.includes(dir)) {
    return false;
  }
  await appendFile(
    rcPath,
    `\n# Added by ${toolName} installer\n${shellExportLine(dir, rcPath)}\n`
  );
  return true;
};

/**
 * Adds `dir` to the persistent Path of `scope`. Entries already present
 * (after normalization) leave the stored value untouched.
 */
export const appendToPathStore = async (
  store: PathStore,
  scope: PathScope,
  dir: string
): Promise<boolean> => {
  const current = await store.read(scope);
  if (containsEntry(current, dir, "windows")) {
    return false;
  }
  const separator = current === "" || current.endsWith(";") ? "" : ";";
  await store.write(scope, `${current}${separator}${dir}`);
  return true;
};

const readEnvironmentScript = (scope: PathScope): string =>
  `[Environment]::GetEnvironmentVariable('Path', '${scope}')`;

const writeEnvironmentScript = (scope: PathScope, value: string): string =>
  `[Environment]::SetEnvironmentVariable('Path', ${quotePowerShell(value)}, '${scope}')`;

/**
 * PathStore backed by PowerShell's [Environment] API. Machine-scope writes
 * run in an elevated PowerShell.
 */
export const createRegistryPathStore = (runner: CommandRunner): PathStore => ({
  read: (scope) =>
    runner.capture("powershell", [
      "-NoProfile",
      "-NonInteractive",
      "-Command",
      readEnvironmentScript(scope),
    ]),
  write: async (scope, value) => {
    const script = writeEnvironmentScript(scope, value);
    if (scope === "Machine") {
      await runner.run("powershell", elevatedPowerShellArgs(script));
      return;
    }
    await runner.run("powershell", [
      "-NoProfile",
      "-NonInteractive",
      "-Command",
      script,
    ]);
  },
});

const integrateShellRc = async (
  options: PathIntegrationOptions
): Promise<PathIntegrationResult> => {
  const rcPath = await findShellRc(options.home);
  if (!rcPath) {
    return {
      kind: "manual",
      commands: unixManualCommands(options.dir),
      reason: "no shell startup file found",
    };
  }

  try {
    const appended = await appendToShellRc(rcPath, options.dir, options.toolName);
    return appended
      ? { kind: "configured", location: rcPath }
      : { kind: "already-configured", location: rcPath };
  } catch (error) {
    const failure = new PathIntegrationFailedError(rcPath, formatError(error));
    return {
      kind: "manual",
      commands: unixManualCommands(options.dir, rcPath),
      location: rcPath,
      reason: failure.message,
    };
  }
};

const integrateRegistry = async (
  options: PathIntegrationOptions
): Promise<PathIntegrationResult> => {
  const scope: PathScope = options.global ? "Machine" : "User";
  const location = `${scope} Path`;

  try {
    const appended = await appendToPathStore(options.pathStore, scope, options.dir);
    return appended
      ? { kind: "configured", location }
      : { kind: "already-configured", location };
  } catch (error) {
    const failure = new PathIntegrationFailedError(location, formatError(error));
    return {
      kind: "manual",
      commands: windowsManualCommands(options.dir, scope),
      location,
      reason: failure.message,
    };
  }
};

const manualResult = async (
  options: PathIntegrationOptions
): Promise<PathIntegrationResult> => {
  if (!options.pathHint) {
    return { kind: "skipped" };
  }
  if (options.strategy.pathStore === "registry") {
    const scope: PathScope = options.global ? "Machine" : "User";
    return { kind: "manual", commands: windowsManualCommands(options.dir, scope) };
  }
  const rcPath = await findShellRc(options.home);
  return {
    kind: "manual",
    commands: unixManualCommands(options.dir, rcPath),
    location: rcPath,
  };
};

/**
 * Makes `dir` reachable through PATH, or describes how to. Never throws:
 * failures to edit the persistent store come back as `manual` with a reason.
 */
export const integratePath = async (
  options: PathIntegrationOptions
): Promise<PathIntegrationResult> => {
  if (isOnPath(options.dir, options.pathValue, options.platform)) {
    return { kind: "on-path" };
  }

  const automatic = options.setupPath ?? options.strategy.setupPathByDefault;
  if (!automatic) {
    return manualResult(options);
  }

  return options.strategy.pathStore === "registry"
    ? integrateRegistry(options)
    : integrateShellRc(options);
};
