import { describe, expect, it } from "vitest";
import {
  DEFAULT_REPO,
  getRepoUrls,
  type InstallOptions,
  resolveInstallConfig,
  resolveSetupPath,
  validateLatestUrl,
  validateRepo,
  validateVersion,
} from "./config.js";

const createOptions = (
  overrides: Partial<InstallOptions> = {}
): InstallOptions => ({
  global: false,
  force: false,
  quiet: false,
  pathHint: true,
  setupPath: false,
  noPathSetup: false,
  ...overrides,
});

describe("validateVersion", () => {
  it("accepts latest in any case", () => {
    expect(validateVersion("LATEST").valid).toBe(true);
  });

  it("accepts tagged and bare versions", () => {
    expect(validateVersion("v1.2.3").valid).toBe(true);
    expect(validateVersion("1.2.3-rc.1").valid).toBe(true);
  });

  it("rejects empty and malformed versions", () => {
    expect(validateVersion("  ")).toEqual({
      valid: false,
      error: "Version must not be empty",
    });
    expect(validateVersion("1.2.3; rm -rf").valid).toBe(false);
  });
});

describe("validateRepo", () => {
  it("requires owner/repo", () => {
    expect(validateRepo("acme/tool").valid).toBe(true);
    expect(validateRepo("acme").error).toBe(
      'MELDOC_REPO must look like owner/repo (got "acme")'
    );
  });
});

describe("validateLatestUrl", () => {
  it("accepts http and https", () => {
    expect(validateLatestUrl("https://example.test/LATEST").valid).toBe(true);
  });

  it("rejects other schemes and garbage", () => {
    expect(validateLatestUrl("file:///tmp/LATEST").error).toBe(
      "MELDOC_LATEST_URL must be an http(s) URL"
    );
    expect(validateLatestUrl("not a url").valid).toBe(false);
  });
});

describe("resolveSetupPath", () => {
  it("maps flags to forced, forbidden or platform default", () => {
    expect(resolveSetupPath({ setupPath: true, noPathSetup: false })).toBe(true);
    expect(resolveSetupPath({ setupPath: false, noPathSetup: true })).toBe(false);
    expect(
      resolveSetupPath({ setupPath: false, noPathSetup: false })
    ).toBeUndefined();
  });
});

describe("getRepoUrls", () => {
  it("derives release page and API base", () => {
    expect(getRepoUrls("acme/tool")).toEqual({
      releasesUrl: "https://github.com/acme/tool/releases",
      apiUrl: "https://api.github.com/repos/acme/tool",
    });
  });
});

describe("resolveInstallConfig", () => {
  it("applies defaults", () => {
    const result = resolveInstallConfig(createOptions(), {});

    expect(result).toEqual({
      ok: true,
      config: {
        toolName: "meldoc",
        releasesUrl: `https://github.com/${DEFAULT_REPO}/releases`,
        versionSource: {
          kind: "releases-api",
          apiUrl: `https://api.github.com/repos/${DEFAULT_REPO}`,
        },
        requestedVersion: "latest",
        targetDir: undefined,
        global: false,
        force: false,
        quiet: false,
        setupPath: undefined,
        pathHint: true,
      },
    });
  });

  it("prefers flags over environment", () => {
    const result = resolveInstallConfig(
      createOptions({ version: "v2.0.0", dir: "/opt/bin" }),
      { MELDOC_VERSION: "v1.0.0", MELDOC_INSTALL_DIR: "/srv/bin" }
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.config.requestedVersion).toBe("v2.0.0");
      expect(result.config.targetDir).toBe("/opt/bin");
    }
  });

  it("reads version and directory from the environment", () => {
    const result = resolveInstallConfig(createOptions(), {
      MELDOC_VERSION: " 1.4.0 ",
      MELDOC_INSTALL_DIR: "/srv/bin",
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.config.requestedVersion).toBe("1.4.0");
      expect(result.config.targetDir).toBe("/srv/bin");
    }
  });

  it("uses the pointer file when MELDOC_LATEST_URL is set", () => {
    const result = resolveInstallConfig(createOptions(), {
      MELDOC_LATEST_URL: "https://downloads.example.test/LATEST",
      GITHUB_TOKEN: "test-secret",
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.config.versionSource).toEqual({
        kind: "pointer",
        url: "https://downloads.example.test/LATEST",
      });
    }
  });

  it("passes GITHUB_TOKEN to the releases API source", () => {
    const result = resolveInstallConfig(createOptions(), {
      GITHUB_TOKEN: "test-secret",
      MELDOC_REPO: "acme/tool",
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.config.versionSource).toEqual({
        kind: "releases-api",
        apiUrl: "https://api.github.com/repos/acme/tool",
        token: "test-secret",
      });
    }
  });

  it("rejects conflicting PATH flags", () => {
    expect(
      resolveInstallConfig(
        createOptions({ setupPath: true, noPathSetup: true }),
        {}
      )
    ).toEqual({
      ok: false,
      error: "--setup-path and --no-path-setup cannot be used together",
    });
  });

  it("rejects an empty --dir", () => {
    expect(resolveInstallConfig(createOptions({ dir: "" }), {})).toEqual({
      ok: false,
      error: "--dir requires a path argument",
    });
  });

  it("rejects an invalid version", () => {
    const result = resolveInstallConfig(createOptions({ version: "1 2" }), {});
    expect(result.ok).toBe(false);
  });

  it("turns off PATH hints in quiet mode", () => {
    const result = resolveInstallConfig(createOptions({ quiet: true }), {});

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.config.pathHint).toBe(false);
    }
  });
});
