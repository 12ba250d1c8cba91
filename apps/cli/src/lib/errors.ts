/**
 * Maps installer failures to console messages, hints and exit codes.
 */

import {
  BinaryNotFoundError,
  ChecksumMismatchError,
  DownloadFailedError,
  formatError,
  InstallerError,
  InstallFailedError,
  InstallInProgressError,
  UninstallFailedError,
  UnsupportedPlatformError,
  VersionLookupFailedError,
} from "@meldoc-installer/core";
import { SIGINT_EXIT_CODE } from "../utils/signal.js";

export interface FailureReport {
  readonly message: string;
  readonly hints: readonly string[];
  readonly exitCode: number;
}

const hintsFor = (error: unknown, releasesUrl: string): string[] => {
  if (error instanceof UnsupportedPlatformError) {
    return [
      "Supported platforms: linux, darwin and windows on amd64 or arm64",
      `Prebuilt archives are listed at ${releasesUrl}`,
    ];
  }
  if (error instanceof VersionLookupFailedError) {
    return [
      "Pass an explicit version with --version to skip the lookup",
      "Set GITHUB_TOKEN if the GitHub API is rate limiting you",
    ];
  }
  if (error instanceof DownloadFailedError) {
    return [
      "Check your network connection and re-run the installer",
      `Download the archive manually from ${releasesUrl}`,
    ];
  }
  if (error instanceof ChecksumMismatchError) {
    return [
      `Expected: ${error.expected}`,
      `Got:      ${error.actual}`,
      "Nothing was installed. Re-run the installer; report the release if it fails again",
    ];
  }
  if (error instanceof BinaryNotFoundError) {
    return [`The release archive does not contain the expected executable (${releasesUrl})`];
  }
  if (error instanceof InstallInProgressError) {
    return [
      "Wait for the other installer to finish, then re-run this one",
      "Or install somewhere else with --dir",
    ];
  }
  if (error instanceof InstallFailedError) {
    return [
      "Install into a directory you own with --dir ~/.local/bin",
      "Or install system-wide with --global (requires administrator rights)",
    ];
  }
  if (error instanceof UninstallFailedError) {
    return ["Remove the file manually, with sudo (or as administrator) if needed"];
  }
  return [];
};

export const describeFailure = (
  error: unknown,
  options: { aborted: boolean; releasesUrl: string }
): FailureReport => {
  if (options.aborted) {
    return { message: "Cancelled", hints: [], exitCode: SIGINT_EXIT_CODE };
  }

  const step = error instanceof InstallerError ? ` (step: ${error.step})` : "";
  return {
    message: `${formatError(error)}${step}`,
    hints: hintsFor(error, options.releasesUrl),
    exitCode: 1,
  };
};
