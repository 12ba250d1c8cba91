import {
  ChecksumMismatchError,
  DownloadFailedError,
  InstallFailedError,
  InstallInProgressError,
} from "@meldoc-installer/core";
import { describe, expect, it } from "vitest";
import { describeFailure } from "./errors.js";

const RELEASES = "https://github.com/acme/tool/releases";

describe("describeFailure", () => {
  it("reports cancellation with the interrupt exit code", () => {
    expect(
      describeFailure(new Error("aborted"), { aborted: true, releasesUrl: RELEASES })
    ).toEqual({ message: "Cancelled", hints: [], exitCode: 130 });
  });

  it("names the failing step", () => {
    const failure = describeFailure(
      new DownloadFailedError("https://example.test/a.tar.gz", "HTTP 404"),
      { aborted: false, releasesUrl: RELEASES }
    );

    expect(failure.message).toBe(
      "download failed: HTTP 404 (https://example.test/a.tar.gz) (step: download)"
    );
    expect(failure.exitCode).toBe(1);
    expect(failure.hints[1]).toBe(`Download the archive manually from ${RELEASES}`);
  });

  it("shows both digests on a checksum mismatch", () => {
    const failure = describeFailure(
      new ChecksumMismatchError("meldoc-1.0.0-linux-amd64.tar.gz", "aaa", "bbb"),
      { aborted: false, releasesUrl: RELEASES }
    );

    expect(failure.hints.slice(0, 2)).toEqual(["Expected: aaa", "Got:      bbb"]);
  });

  it("suggests --dir for install failures", () => {
    const failure = describeFailure(
      new InstallFailedError("/usr/local/bin/meldoc", "permission denied"),
      { aborted: false, releasesUrl: RELEASES }
    );

    expect(failure.hints[0]).toBe(
      "Install into a directory you own with --dir ~/.local/bin"
    );
  });

  it("tells the user to wait when another install holds the lock", () => {
    const failure = describeFailure(
      new InstallInProgressError("/home/u/.local/bin/meldoc"),
      { aborted: false, releasesUrl: RELEASES }
    );

    expect(failure).toEqual({
      message:
        "another installation to /home/u/.local/bin/meldoc is in progress (step: install)",
      hints: [
        "Wait for the other installer to finish, then re-run this one",
        "Or install somewhere else with --dir",
      ],
      exitCode: 1,
    });
  });

  it("passes unknown errors through without a step", () => {
    expect(
      describeFailure("boom", { aborted: false, releasesUrl: RELEASES })
    ).toEqual({ message: "boom", hints: [], exitCode: 1 });
  });
});
