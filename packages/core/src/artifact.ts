import { getPlatformStrategy } from "./platform.js";
import type {
  ArtifactDescriptor,
  PlatformTag,
  ResolvedVersion,
} from "./types.js";

export const CHECKSUM_MANIFEST = "SHA256SUMS";

const TRAILING_SLASH_REGEX = /\/+$/;

/**
 * Builds the deterministic archive name and URLs for one release/platform:
 * `<tool>-<numeric>-<os>-<arch>.<ext>` under `<releases>/download/<tag>/`.
 */
export const buildArtifact = (
  toolName: string,
  releasesUrl: string,
  version: ResolvedVersion,
  platform: PlatformTag
): ArtifactDescriptor => {
  const { archive } = getPlatformStrategy(platform);
  const filename = `${toolName}-${version.numeric}-${platform.os}-${platform.arch}.${archive}`;
  const base = `${releasesUrl.replace(TRAILING_SLASH_REGEX, "")}/download/${version.tag}`;

  return {
    filename,
    downloadUrl: `${base}/${filename}`,
    checksumUrl: `${base}/${CHECKSUM_MANIFEST}`,
  };
};
