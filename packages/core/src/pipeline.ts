import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildArtifact } from "./artifact.js";
import { verifyChecksum, type ChecksumResult } from "./checksum.js";
import { downloadFile, formatBytes } from "./download.js";
import {
  formatError,
  InstallFailedError,
  InstallInProgressError,
} from "./errors.js";
import {
  createCommandRunner,
  extractVersion,
  probeInstalledVersion,
  type CommandRunner,
} from "./exec.js";
import { extractArchive, locateBinary } from "./extract.js";
import { installBinary, isInstalledAt, prepareTargetDir } from "./install.js";
import { tryAcquireLock } from "./lock.js";
import {
  createRegistryPathStore,
  getPathValue,
  integratePath,
  type PathStore,
} from "./path-setup.js";
import { pathApi, resolveTargetDir } from "./paths.js";
import {
  classifyPlatform,
  formatPlatform,
  getBinaryName,
  getPlatformStrategy,
} from "./platform.js";
import type {
  Environment,
  HostInfo,
  InstallConfig,
  InstallPhase,
  PathIntegrationResult,
  PhaseListener,
  PlatformTag,
  Reporter,
  ResolvedVersion,
  VersionComparison,
} from "./types.js";
import { compareVersions, isLatest, resolveVersion } from "./version.js";

export interface InstallDeps {
  readonly reporter: Reporter;
  readonly host: HostInfo;
  readonly env: Environment;
  readonly homeDir: string;
  /** Parent of the scratch directory; defaults to the OS temp directory */
  readonly tmpRoot?: string;
  /** Directory holding install lock files; defaults to the OS temp directory */
  readonly lockDir?: string;
  readonly runner?: CommandRunner;
  readonly pathStore?: PathStore;
  readonly signal?: AbortSignal;
  readonly onPhase?: PhaseListener;
  readonly probeVersion?: (binaryPath: string) => Promise<string>;
}

export type InstallOutcome =
  | {
      readonly kind: "installed";
      readonly destination: string;
      readonly targetDir: string;
      readonly platform: PlatformTag;
      readonly version: ResolvedVersion;
      readonly checksum: ChecksumResult;
      readonly elevated: boolean;
      /** `<destination> version` output after install, or "unknown" */
      readonly reportedVersion: string;
      readonly path: PathIntegrationResult;
    }
  | {
      readonly kind: "already-installed";
      readonly destination: string;
      readonly platform: PlatformTag;
      readonly version: ResolvedVersion;
      readonly installedVersion: string;
      readonly comparison: VersionComparison;
    };

/**
 * Runs one installation: platform, version, download, checksum, extract,
 * install and PATH integration, in that order.
 *
 * The scratch directory and the install lock are released on every exit
 * path, including an abort through `deps.signal`.
 */
export const runInstall = async (
  config: InstallConfig,
  deps: InstallDeps
): Promise<InstallOutcome> => {
  const { reporter, signal, onPhase } = deps;
  const runner = deps.runner ?? createCommandRunner();
  const probe = deps.probeVersion ?? probeInstalledVersion;

  const phase = async <T>(
    name: InstallPhase,
    fn: () => Promise<T> | T
  ): Promise<T> => {
    signal?.throwIfAborted();
    onPhase?.(name, "start");
    try {
      return await fn();
    } finally {
      onPhase?.(name, "end");
    }
  };

  const platform = await phase("platform", () =>
    classifyPlatform(deps.host.kernel, deps.host.machine)
  );
  const strategy = getPlatformStrategy(platform);
  reporter.step(`Detected platform: ${formatPlatform(platform)}`);

  const version = await phase("version", async () => {
    if (isLatest(config.requestedVersion)) {
      reporter.step("Resolving latest version...");
    }
    return resolveVersion(config.requestedVersion, config.versionSource, signal);
  });
  reporter.detail(`Version: ${version.tag}`);

  const targetDir = resolveTargetDir(config, {
    platform,
    home: deps.homeDir,
    env: deps.env,
  });
  const binaryName = getBinaryName(config.toolName, platform);
  const destination = pathApi(platform).join(targetDir, binaryName);

  const lock = tryAcquireLock(destination, deps.lockDir);
  if (!lock.success) {
    if (lock.reason === "busy") {
      throw new InstallInProgressError(destination);
    }
    throw new InstallFailedError(
      destination,
      `could not acquire install lock: ${formatError(lock.error)}`
    );
  }

  let scratch: string | undefined;
  try {
    if (!config.force && (await isInstalledAt(destination))) {
      const installedVersion = await probe(destination);
      return {
        kind: "already-installed",
        destination,
        platform,
        version,
        installedVersion,
        comparison: compareVersions(
          extractVersion(installedVersion) ?? installedVersion,
          version.numeric
        ),
      };
    }

    const target = await phase("prepare", () =>
      prepareTargetDir(targetDir, config.toolName, config.global)
    );

    const scratchDir = await mkdtemp(
      join(deps.tmpRoot ?? tmpdir(), `${config.toolName}-install-`)
    );
    scratch = scratchDir;
    const artifact = buildArtifact(
      config.toolName,
      config.releasesUrl,
      version,
      platform
    );

    const download = await phase("download", () => {
      reporter.step(`Downloading ${artifact.filename}`);
      reporter.detail(artifact.downloadUrl);
      return downloadFile(
        artifact.downloadUrl,
        join(scratchDir, artifact.filename),
        { signal }
      );
    });
    reporter.success(`Downloaded ${formatBytes(download.size)}`);

    const checksum = await phase("checksum", () =>
      verifyChecksum(artifact.filename, download.sha256, artifact.checksumUrl, signal)
    );
    if (checksum.status === "verified") {
      reporter.success("Checksum verified");
    } else if (checksum.reason === "manifest-unavailable") {
      reporter.warn("Checksum manifest not available, skipping verification");
    } else {
      reporter.warn(
        `No checksum entry for ${artifact.filename}, skipping verification`
      );
    }

    const extractDir = join(scratchDir, "extract");
    const binary = await phase("extract", async () => {
      reporter.step("Extracting archive");
      await extractArchive(download.path, extractDir);
      return locateBinary(extractDir, binaryName);
    });

    await phase("install", async () => {
      reporter.step(`Installing to ${destination}`);
      if (target.needsElevation) {
        reporter.detail("Requesting elevated privileges for the install step");
      }
      await installBinary(binary, destination, {
        platform,
        elevated: target.needsElevation,
        runner,
      });
    });
    reporter.success(`Installed ${config.toolName} ${version.tag}`);

    const reportedVersion = await probe(destination);

    const path = await phase("path", () =>
      integratePath({
        dir: targetDir,
        toolName: config.toolName,
        platform,
        strategy,
        pathValue: getPathValue(deps.env),
        home: deps.homeDir,
        global: config.global,
        setupPath: config.setupPath,
        pathHint: config.pathHint,
        pathStore: deps.pathStore ?? createRegistryPathStore(runner),
      })
    );

    return {
      kind: "installed",
      destination,
      targetDir,
      platform,
      version,
      checksum,
      elevated: target.needsElevation,
      reportedVersion,
      path,
    };
  } finally {
    if (scratch) {
      await rm(scratch, { recursive: true, force: true });
    }
    lock.release();
  }
};
