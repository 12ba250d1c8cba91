import os from "node:os";
import { UnsupportedPlatformError } from "./errors.js";
import type {
  Architecture,
  HostInfo,
  OperatingSystem,
  PlatformStrategy,
  PlatformTag,
} from "./types.js";

const WINDOWS_KERNEL_MARKERS = ["windows", "mingw", "msys", "cygwin"] as const;

const ARCH_ALIASES: Record<string, Architecture> = {
  x86_64: "amd64",
  amd64: "amd64",
  x64: "amd64",
  aarch64: "arm64",
  arm64: "arm64",
};

export const PLATFORM_STRATEGIES: Record<OperatingSystem, PlatformStrategy> = {
  linux: {
    archive: "tar.gz",
    executableSuffix: "",
    pathStore: "shell-rc",
    setupPathByDefault: false,
  },
  darwin: {
    archive: "tar.gz",
    executableSuffix: "",
    pathStore: "shell-rc",
    setupPathByDefault: false,
  },
  windows: {
    archive: "zip",
    executableSuffix: ".exe",
    pathStore: "registry",
    setupPathByDefault: true,
  },
};

const classifyOs = (kernel: string): OperatingSystem | undefined => {
  const name = kernel.trim().toLowerCase();
  if (name.includes("linux")) {
    return "linux";
  }
  if (name.includes("darwin")) {
    return "darwin";
  }
  if (WINDOWS_KERNEL_MARKERS.some((marker) => name.includes(marker))) {
    return "windows";
  }
  return undefined;
};

/**
 * Maps a raw kernel name and machine string to a canonical platform tag.
 * Throws UnsupportedPlatformError for anything outside the supported table.
 */
export const classifyPlatform = (
  kernel: string,
  machine: string
): PlatformTag => {
  const detectedOs = classifyOs(kernel);
  if (!detectedOs) {
    throw new UnsupportedPlatformError(`unsupported OS: ${kernel}`);
  }

  const arch = ARCH_ALIASES[machine.trim().toLowerCase()];
  if (!arch) {
    throw new UnsupportedPlatformError(`unsupported architecture: ${machine}`);
  }

  return { os: detectedOs, arch };
};

export const detectHost = (): HostInfo => ({
  kernel: os.type(),
  machine: os.machine(),
});

export const getPlatformStrategy = (platform: PlatformTag): PlatformStrategy =>
  PLATFORM_STRATEGIES[platform.os];

export const getBinaryName = (
  toolName: string,
  platform: PlatformTag
): string => `${toolName}${getPlatformStrategy(platform).executableSuffix}`;

export const formatPlatform = (platform: PlatformTag): string =>
  `${platform.os}/${platform.arch}`;
