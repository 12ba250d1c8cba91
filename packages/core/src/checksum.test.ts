import { afterEach, describe, expect, test, vi } from "vitest";
import { parseChecksums, verifyChecksum } from "./checksum.js";
import { ChecksumMismatchError } from "./errors.js";

const DIGEST_A = "a".repeat(64);
const DIGEST_B = "b".repeat(64);
const CHECKSUM_URL = "https://downloads.example.test/v1.0.0/SHA256SUMS";

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("parseChecksums", () => {
  test("reads text and binary mode records", () => {
    const checksums = parseChecksums(
      [
        `${DIGEST_A}  meldoc-1.0.0-linux-amd64.tar.gz`,
        `${DIGEST_B.toUpperCase()} *meldoc-1.0.0-windows-amd64.zip`,
        "",
        "garbage",
      ].join("\n")
    );

    expect(checksums.size).toBe(2);
    expect(checksums.get("meldoc-1.0.0-linux-amd64.tar.gz")).toBe(DIGEST_A);
    expect(checksums.get("meldoc-1.0.0-windows-amd64.zip")).toBe(DIGEST_B);
  });

  test("strips a leading ./ and keeps the first entry", () => {
    const checksums = parseChecksums(
      `${DIGEST_A}  ./tool.tar.gz\n${DIGEST_B}  tool.tar.gz\n`
    );
    expect(checksums.get("tool.tar.gz")).toBe(DIGEST_A);
  });

  test("keeps digests of any length", () => {
    const checksums = parseChecksums("ABC123  tool-2.3.4-linux-amd64.tar.gz\n");
    expect(checksums.get("tool-2.3.4-linux-amd64.tar.gz")).toBe("abc123");
  });

  test("handles CRLF manifests", () => {
    const checksums = parseChecksums(`${DIGEST_A}  tool.tar.gz\r\n`);
    expect(checksums.get("tool.tar.gz")).toBe(DIGEST_A);
  });
});

describe("verifyChecksum", () => {
  const stubManifest = (body: string | null) => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        body === null
          ? new Response("not found", { status: 404 })
          : new Response(body, { status: 200 })
      )
    );
  };

  test("matching digest is verified", async () => {
    stubManifest(`${DIGEST_A}  tool.tar.gz\n`);
    await expect(
      verifyChecksum("tool.tar.gz", DIGEST_A.toUpperCase(), CHECKSUM_URL)
    ).resolves.toEqual({ status: "verified", digest: DIGEST_A });
  });

  test("mismatching digest throws", async () => {
    stubManifest(`${DIGEST_A}  tool.tar.gz\n`);
    const result = verifyChecksum("tool.tar.gz", DIGEST_B, CHECKSUM_URL);

    await expect(result).rejects.toBeInstanceOf(ChecksumMismatchError);
    await expect(result).rejects.toThrow(
      "checksum verification failed for tool.tar.gz"
    );
  });

  test("short manifest digest that matches is verified", async () => {
    stubManifest("abc123  tool-2.3.4-linux-amd64.tar.gz\n");
    await expect(
      verifyChecksum("tool-2.3.4-linux-amd64.tar.gz", "abc123", CHECKSUM_URL)
    ).resolves.toEqual({ status: "verified", digest: "abc123" });
  });

  test("short manifest digest that differs throws", async () => {
    stubManifest("abc123  tool-2.3.4-linux-amd64.tar.gz\n");
    await expect(
      verifyChecksum("tool-2.3.4-linux-amd64.tar.gz", DIGEST_B, CHECKSUM_URL)
    ).rejects.toBeInstanceOf(ChecksumMismatchError);
  });

  test("truncated manifest digest throws instead of skipping", async () => {
    stubManifest(`${DIGEST_A.slice(1)}  tool.tar.gz\n`);
    await expect(
      verifyChecksum("tool.tar.gz", DIGEST_A, CHECKSUM_URL)
    ).rejects.toBeInstanceOf(ChecksumMismatchError);
  });

  test("missing manifest skips verification", async () => {
    stubManifest(null);
    await expect(
      verifyChecksum("tool.tar.gz", DIGEST_B, CHECKSUM_URL)
    ).resolves.toEqual({ status: "skipped", reason: "manifest-unavailable" });
  });

  test("unreachable manifest skips verification", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );
    await expect(
      verifyChecksum("tool.tar.gz", DIGEST_B, CHECKSUM_URL)
    ).resolves.toEqual({ status: "skipped", reason: "manifest-unavailable" });
  });

  test("manifest without an entry skips verification", async () => {
    stubManifest(`${DIGEST_A}  other.tar.gz\n`);
    await expect(
      verifyChecksum("tool.tar.gz", DIGEST_B, CHECKSUM_URL)
    ).resolves.toEqual({ status: "skipped", reason: "entry-missing" });
  });
});
