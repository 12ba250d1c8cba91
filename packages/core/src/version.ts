import { compare, valid } from "semver";
import { formatError, VersionLookupFailedError } from "./errors.js";
import type {
  ResolvedVersion,
  VersionComparison,
  VersionSource,
} from "./types.js";

const VERSION_PREFIX_REGEX = /^v/i;
const VERSION_CHARS_REGEX = /^[0-9A-Za-z.+-]+$/;
const LATEST = "latest";
const USER_AGENT = "meldoc-installer";

interface ReleaseMetadata {
  tag_name?: unknown;
}

const isReleaseMetadata = (data: unknown): data is ReleaseMetadata =>
  typeof data === "object" && data !== null;

export const isLatest = (requested: string): boolean =>
  requested.trim().toLowerCase() === LATEST;

/**
 * Normalizes "v2.3.4" and "2.3.4" to the same tag/numeric pair.
 */
export const normalizeVersion = (input: string): ResolvedVersion => {
  const trimmed = input.trim();
  const numeric = trimmed.replace(VERSION_PREFIX_REGEX, "");

  if (!numeric) {
    throw new VersionLookupFailedError("version must not be empty");
  }
  if (!VERSION_CHARS_REGEX.test(numeric)) {
    throw new VersionLookupFailedError(`invalid version: ${input}`);
  }

  return { tag: `v${numeric}`, numeric };
};

const fetchOrFail = async (
  url: string,
  init: RequestInit
): Promise<Response> => {
  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    if (init.signal?.aborted) {
      throw error;
    }
    throw new VersionLookupFailedError(
      `could not reach ${url}: ${formatError(error)}`,
      url
    );
  }

  if (!response.ok) {
    throw new VersionLookupFailedError(
      `version lookup failed: HTTP ${response.status} from ${url}`,
      url
    );
  }
  return response;
};

const fetchPointer = async (
  url: string,
  signal?: AbortSignal
): Promise<string> => {
  const response = await fetchOrFail(url, {
    headers: { "User-Agent": USER_AGENT },
    signal,
  });
  const body = (await response.text()).trim();
  if (!body) {
    throw new VersionLookupFailedError(`version pointer is empty: ${url}`, url);
  }
  return body;
};

const fetchLatestRelease = async (
  apiUrl: string,
  token: string | undefined,
  signal?: AbortSignal
): Promise<string> => {
  const url = `${apiUrl}/releases/latest`;
  const response = await fetchOrFail(url, {
    headers: {
      Accept: "application/vnd.github+json",
      "User-Agent": USER_AGENT,
      ...(token ? { Authorization: `Bearer ${token}` } : {}),
    },
    signal,
  });

  let metadata: unknown;
  try {
    metadata = JSON.parse(await response.text());
  } catch {
    throw new VersionLookupFailedError(
      `release metadata is not valid JSON: ${url}`,
      url
    );
  }

  if (
    !isReleaseMetadata(metadata) ||
    typeof metadata.tag_name !== "string" ||
    !metadata.tag_name.trim()
  ) {
    throw new VersionLookupFailedError(
      "could not determine latest version: release has no tag_name",
      url
    );
  }
  return metadata.tag_name;
};

/**
 * Resolves "latest" through the configured source; explicit versions are
 * normalized without touching the network.
 */
export const resolveVersion = async (
  requested: string,
  source: VersionSource,
  signal?: AbortSignal
): Promise<ResolvedVersion> => {
  if (!isLatest(requested)) {
    return normalizeVersion(requested);
  }

  const tag =
    source.kind === "pointer"
      ? await fetchPointer(source.url, signal)
      : await fetchLatestRelease(source.apiUrl, source.token, signal);

  return normalizeVersion(tag);
};

/**
 * Strict semver comparison of an installed version against a target.
 * Returns "unknown" unless both sides are valid semantic versions.
 */
export const compareVersions = (
  installed: string,
  target: string
): VersionComparison => {
  const installedClean = valid(installed.trim().replace(VERSION_PREFIX_REGEX, ""));
  const targetClean = valid(target.trim().replace(VERSION_PREFIX_REGEX, ""));

  if (!(installedClean && targetClean)) {
    return "unknown";
  }

  const result = compare(installedClean, targetClean);
  if (result < 0) {
    return "older";
  }
  if (result > 0) {
    return "newer";
  }
  return "same";
};
