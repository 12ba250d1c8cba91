export type InstallStep =
  | "platform"
  | "version"
  | "download"
  | "checksum"
  | "extract"
  | "locate"
  | "install"
  | "path"
  | "uninstall";

/**
 * Base class for every failure the installer reports to the user.
 * `step` names the pipeline stage that failed.
 */
export class InstallerError extends Error {
  readonly step: InstallStep;

  constructor(message: string, step: InstallStep) {
    super(message);
    this.name = "InstallerError";
    this.step = step;
    Object.setPrototypeOf(this, InstallerError.prototype);
  }
}

export class UnsupportedPlatformError extends InstallerError {
  constructor(message: string) {
    super(message, "platform");
    this.name = "UnsupportedPlatformError";
    Object.setPrototypeOf(this, UnsupportedPlatformError.prototype);
  }
}

export class VersionLookupFailedError extends InstallerError {
  readonly url?: string;

  constructor(message: string, url?: string) {
    super(message, "version");
    this.name = "VersionLookupFailedError";
    this.url = url;
    Object.setPrototypeOf(this, VersionLookupFailedError.prototype);
  }
}

export class DownloadFailedError extends InstallerError {
  readonly url: string;

  constructor(url: string, reason: string) {
    super(`download failed: ${reason} (${url})`, "download");
    this.name = "DownloadFailedError";
    this.url = url;
    Object.setPrototypeOf(this, DownloadFailedError.prototype);
  }
}

export class ChecksumMismatchError extends InstallerError {
  readonly expected: string;
  readonly actual: string;

  constructor(filename: string, expected: string, actual: string) {
    super(`checksum verification failed for ${filename}`, "checksum");
    this.name = "ChecksumMismatchError";
    this.expected = expected;
    this.actual = actual;
    Object.setPrototypeOf(this, ChecksumMismatchError.prototype);
  }
}

export class ExtractionFailedError extends InstallerError {
  constructor(archivePath: string, reason: string) {
    super(`failed to extract ${archivePath}: ${reason}`, "extract");
    this.name = "ExtractionFailedError";
    Object.setPrototypeOf(this, ExtractionFailedError.prototype);
  }
}

export class BinaryNotFoundError extends InstallerError {
  readonly searchedDir: string;

  constructor(binaryName: string, searchedDir: string) {
    super(`binary not found after extraction: ${binaryName}`, "locate");
    this.name = "BinaryNotFoundError";
    this.searchedDir = searchedDir;
    Object.setPrototypeOf(this, BinaryNotFoundError.prototype);
  }
}

export class InstallFailedError extends InstallerError {
  readonly destination: string;

  constructor(destination: string, reason: string) {
    super(`cannot install to ${destination}: ${reason}`, "install");
    this.name = "InstallFailedError";
    this.destination = destination;
    Object.setPrototypeOf(this, InstallFailedError.prototype);
  }
}

/**
 * Another run holds the install lock for the same destination.
 */
export class InstallInProgressError extends InstallerError {
  readonly destination: string;

  constructor(destination: string) {
    super(
      `another installation to ${destination} is in progress`,
      "install"
    );
    this.name = "InstallInProgressError";
    this.destination = destination;
    Object.setPrototypeOf(this, InstallInProgressError.prototype);
  }
}

/**
 * Never escapes the pipeline: PATH failures degrade to manual instructions.
 */
export class PathIntegrationFailedError extends InstallerError {
  constructor(location: string, reason: string) {
    super(`could not update PATH in ${location}: ${reason}`, "path");
    this.name = "PathIntegrationFailedError";
    Object.setPrototypeOf(this, PathIntegrationFailedError.prototype);
  }
}

export class UninstallFailedError extends InstallerError {
  constructor(path: string, reason: string) {
    super(`failed to remove ${path}: ${reason}`, "uninstall");
    this.name = "UninstallFailedError";
    Object.setPrototypeOf(this, UninstallFailedError.prototype);
  }
}

export const formatError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

export const isErrnoException = (
  error: unknown
): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;
