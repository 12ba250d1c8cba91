import { existsSync } from "node:fs";
import { posix, win32 } from "node:path";
import type { Environment, PlatformTag } from "./types.js";

const HOMEBREW_BIN = "/opt/homebrew/bin";
const UNIX_GLOBAL_BIN = "/usr/local/bin";
const TILDE_PREFIX_REGEX = /^~(?=$|[/\\])/;

export interface DirectoryContext {
  readonly platform: PlatformTag;
  readonly home: string;
  readonly env: Environment;
  /** Injected for tests; defaults to fs.existsSync */
  readonly exists?: (path: string) => boolean;
}

export const pathApi = (platform: PlatformTag): typeof posix =>
  platform.os === "windows" ? win32 : posix;

export const expandHome = (path: string, home: string): string =>
  path.replace(TILDE_PREFIX_REGEX, home);

const localAppData = (ctx: DirectoryContext): string =>
  ctx.env.LOCALAPPDATA || win32.join(ctx.home, "AppData", "Local");

const programFiles = (ctx: DirectoryContext): string =>
  ctx.env.ProgramFiles || ctx.env.PROGRAMFILES || "C:\\Program Files";

export const getUserInstallDir = (
  toolName: string,
  ctx: DirectoryContext
): string => {
  if (ctx.platform.os === "windows") {
    return win32.join(localAppData(ctx), toolName, "bin");
  }
  return posix.join(ctx.home, ".local", "bin");
};

export const getGlobalInstallDir = (
  toolName: string,
  ctx: DirectoryContext
): string => {
  if (ctx.platform.os === "windows") {
    return win32.join(programFiles(ctx), toolName);
  }
  const exists = ctx.exists ?? existsSync;
  if (ctx.platform.os === "darwin" && exists(HOMEBREW_BIN)) {
    return HOMEBREW_BIN;
  }
  return UNIX_GLOBAL_BIN;
};

/**
 * Target directory precedence: explicit directory (flag or environment),
 * then the global default when `global`, then the per-user default.
 */
export const resolveTargetDir = (
  options: { toolName: string; targetDir?: string; global: boolean },
  ctx: DirectoryContext
): string => {
  if (options.targetDir) {
    return pathApi(ctx.platform).resolve(expandHome(options.targetDir, ctx.home));
  }
  if (options.global) {
    return getGlobalInstallDir(options.toolName, ctx);
  }
  return getUserInstallDir(options.toolName, ctx);
};

/**
 * Directories the uninstaller checks when the binary is not on PATH.
 */
export const getCommonInstallDirs = (
  toolName: string,
  ctx: DirectoryContext
): string[] => {
  if (ctx.platform.os === "windows") {
    return [
      getUserInstallDir(toolName, ctx),
      win32.join(programFiles(ctx), toolName),
    ];
  }

  const dirs = [
    UNIX_GLOBAL_BIN,
    "/usr/bin",
    posix.join(ctx.home, ".local", "bin"),
    posix.join(ctx.home, "bin"),
  ];
  if (ctx.platform.os === "darwin") {
    dirs.push(HOMEBREW_BIN);
  }
  return dirs;
};
