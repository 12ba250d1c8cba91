/**
 * Install configuration for the CLI.
 *
 * Precedence: flags, then environment, then defaults. The result is one
 * immutable InstallConfig handed to every pipeline step.
 */

import type {
  Environment,
  InstallConfig,
  VersionSource,
} from "@meldoc-installer/core";

// ============================================================================
// Types
// ============================================================================

/**
 * Normalized command-line options, before environment and defaults apply.
 */
export interface InstallOptions {
  global: boolean;
  dir?: string;
  version?: string;
  force: boolean;
  quiet: boolean;
  pathHint: boolean;
  /** `--setup-path` */
  setupPath: boolean;
  /** `--no-path-setup` */
  noPathSetup: boolean;
}

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

export type InstallConfigResult =
  | { ok: true; config: InstallConfig }
  | { ok: false; error: string };

// ============================================================================
// Constants
// ============================================================================

export const TOOL_NAME = "meldoc";
export const DEFAULT_REPO = "meldoc-io/meldoc-cli";
export const DOCS_URL = "https://public.meldoc.io/meldoc/cli";

const GITHUB_URL = "https://github.com";
const GITHUB_API_URL = "https://api.github.com";

const REPO_REGEX = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;
const VERSION_REGEX = /^v?[0-9A-Za-z.+-]+$/;

// ============================================================================
// Validation Helpers
// ============================================================================

export const validateRepo = (repo: string): ValidationResult => {
  if (!REPO_REGEX.test(repo)) {
    return {
      valid: false,
      error: `MELDOC_REPO must look like owner/repo (got "${repo}")`,
    };
  }
  return { valid: true };
};

export const validateVersion = (version: string): ValidationResult => {
  const trimmed = version.trim();
  if (trimmed === "") {
    return { valid: false, error: "Version must not be empty" };
  }
  if (trimmed.toLowerCase() === "latest") {
    return { valid: true };
  }
  if (!VERSION_REGEX.test(trimmed)) {
    return {
      valid: false,
      error: `Invalid version "${trimmed}". Expected "latest" or a version such as 1.2.3 or v1.2.3`,
    };
  }
  return { valid: true };
};

export const validateLatestUrl = (url: string): ValidationResult => {
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
      return {
        valid: false,
        error: "MELDOC_LATEST_URL must be an http(s) URL",
      };
    }
    return { valid: true };
  } catch {
    return { valid: false, error: `MELDOC_LATEST_URL is not a valid URL: ${url}` };
  }
};

export const validateDir = (dir: string): ValidationResult => {
  if (dir.trim() === "") {
    return { valid: false, error: "--dir requires a path argument" };
  }
  return { valid: true };
};

// ============================================================================
// Resolution
// ============================================================================

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * `--setup-path` forces PATH edits, `--no-path-setup` forbids them, and
 * neither leaves the platform default in place.
 */
export const resolveSetupPath = (
  options: Pick<InstallOptions, "setupPath" | "noPathSetup">
): boolean | undefined => {
  if (options.noPathSetup) {
    return false;
  }
  return options.setupPath ? true : undefined;
};

export const getRepoUrls = (
  repo: string
): { releasesUrl: string; apiUrl: string } => ({
  releasesUrl: `${GITHUB_URL}/${repo}/releases`,
  apiUrl: `${GITHUB_API_URL}/repos/${repo}`,
});

export const resolveInstallConfig = (
  options: InstallOptions,
  env: Environment
): InstallConfigResult => {
  if (options.setupPath && options.noPathSetup) {
    return {
      ok: false,
      error: "--setup-path and --no-path-setup cannot be used together",
    };
  }

  const repo = nonEmpty(env.MELDOC_REPO) ?? DEFAULT_REPO;
  const version = nonEmpty(options.version) ?? nonEmpty(env.MELDOC_VERSION) ?? "latest";
  const targetDir = options.dir ?? nonEmpty(env.MELDOC_INSTALL_DIR);
  const latestUrl = nonEmpty(env.MELDOC_LATEST_URL);

  const checks: ValidationResult[] = [
    validateRepo(repo),
    validateVersion(version),
    ...(targetDir === undefined ? [] : [validateDir(targetDir)]),
    ...(latestUrl === undefined ? [] : [validateLatestUrl(latestUrl)]),
  ];
  const failed = checks.find((check) => !check.valid);
  if (failed) {
    return { ok: false, error: failed.error ?? "Invalid configuration" };
  }

  const { releasesUrl, apiUrl } = getRepoUrls(repo);
  const token = nonEmpty(env.GITHUB_TOKEN);
  const versionSource: VersionSource = latestUrl
    ? { kind: "pointer", url: latestUrl }
    : { kind: "releases-api", apiUrl, ...(token ? { token } : {}) };

  return {
    ok: true,
    config: {
      toolName: TOOL_NAME,
      releasesUrl,
      versionSource,
      requestedVersion: version,
      targetDir,
      global: options.global,
      force: options.force,
      quiet: options.quiet,
      setupPath: resolveSetupPath(options),
      // --quiet implies no hints
      pathHint: options.pathHint && !options.quiet,
    },
  };
};
