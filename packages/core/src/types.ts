export type OperatingSystem = "linux" | "darwin" | "windows";
export type Architecture = "amd64" | "arm64";

export interface PlatformTag {
  readonly os: OperatingSystem;
  readonly arch: Architecture;
}

/**
 * Raw host identification, as reported by `os.type()` and `os.machine()`
 * (or `uname -s` / `uname -m`).
 */
export interface HostInfo {
  readonly kernel: string;
  readonly machine: string;
}

export interface ResolvedVersion {
  /** "v"-prefixed tag, used in every download URL */
  readonly tag: string;
  /** Unprefixed form, used only inside the artifact filename */
  readonly numeric: string;
}

export interface ArtifactDescriptor {
  readonly filename: string;
  readonly downloadUrl: string;
  readonly checksumUrl: string;
}

export type ArchiveType = "tar.gz" | "zip";

export interface PlatformStrategy {
  readonly archive: ArchiveType;
  readonly executableSuffix: string;
  readonly pathStore: "shell-rc" | "registry";
  /** Whether PATH is edited without an explicit --setup-path */
  readonly setupPathByDefault: boolean;
}

export type VersionSource =
  | { readonly kind: "releases-api"; readonly apiUrl: string; readonly token?: string }
  | { readonly kind: "pointer"; readonly url: string };

/**
 * Immutable configuration shared by every install step.
 */
export interface InstallConfig {
  readonly toolName: string;
  readonly releasesUrl: string;
  readonly versionSource: VersionSource;
  readonly requestedVersion: string;
  /** Explicit target directory (flag or environment); defaults apply when absent */
  readonly targetDir?: string;
  readonly global: boolean;
  readonly force: boolean;
  readonly quiet: boolean;
  /** true = edit PATH, false = never edit, undefined = platform default */
  readonly setupPath?: boolean;
  readonly pathHint: boolean;
}

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Progress sink for the pipeline. The core never writes to the console.
 */
export interface Reporter {
  step(message: string): void;
  detail(message: string): void;
  success(message: string): void;
  warn(message: string): void;
}

export type InstallPhase =
  | "platform"
  | "version"
  | "prepare"
  | "download"
  | "checksum"
  | "extract"
  | "install"
  | "path";

export type PhaseListener = (
  phase: InstallPhase,
  state: "start" | "end"
) => void;

export type VersionComparison = "older" | "same" | "newer" | "unknown";

export type PathScope = "User" | "Machine";

export type PathIntegrationResult =
  | { readonly kind: "on-path" }
  | { readonly kind: "configured"; readonly location: string }
  | { readonly kind: "already-configured"; readonly location: string }
  | {
      readonly kind: "manual";
      readonly commands: readonly string[];
      readonly location?: string;
      readonly reason?: string;
    }
  | { readonly kind: "skipped" };
