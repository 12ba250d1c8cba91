import { fetchOptionalText } from "./download.js";
import { ChecksumMismatchError } from "./errors.js";

const CHECKSUM_LINE_REGEX = /^(\S+)\s+\*?(?:\.\/)?(.+)$/;

export type ChecksumResult =
  | { readonly status: "verified"; readonly digest: string }
  | {
      readonly status: "skipped";
      readonly reason: "manifest-unavailable" | "entry-missing";
    };

/**
 * Parses a `sha256sum`-style manifest into filename -> lower-case digest.
 * Accepts both "hash  name" and binary-mode "hash *name" records. The digest
 * is taken as written: a short or malformed one still gets compared, and
 * fails, rather than disabling verification.
 */
export const parseChecksums = (content: string): Map<string, string> => {
  const checksums = new Map<string, string>();

  for (const line of content.split("\n")) {
    const match = line.trim().match(CHECKSUM_LINE_REGEX);
    const digest = match?.[1];
    const filename = match?.[2];
    if (digest && filename && !checksums.has(filename.trim())) {
      checksums.set(filename.trim(), digest.toLowerCase());
    }
  }

  return checksums;
};

/**
 * Best-effort verification of an already-computed artifact digest.
 *
 * A missing manifest or a manifest without an entry for `filename` skips
 * verification; a present entry with a different digest throws
 * ChecksumMismatchError.
 */
export const verifyChecksum = async (
  filename: string,
  actualDigest: string,
  checksumUrl: string,
  signal?: AbortSignal
): Promise<ChecksumResult> => {
  const manifest = await fetchOptionalText(checksumUrl, signal);
  if (manifest === null) {
    return { status: "skipped", reason: "manifest-unavailable" };
  }

  const expected = parseChecksums(manifest).get(filename);
  if (!expected) {
    return { status: "skipped", reason: "entry-missing" };
  }

  const actual = actualDigest.toLowerCase();
  if (actual !== expected) {
    throw new ChecksumMismatchError(filename, expected, actual);
  }

  return { status: "verified", digest: actual };
};
