import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { CommandRunner } from "./exec.js";
import {
  createRegistryPathStore,
  getPathValue,
  integratePath,
  isOnPath,
  type PathIntegrationOptions,
  type PathStore,
} from "./path-setup.js";
import { PLATFORM_STRATEGIES } from "./platform.js";
import type { PathScope } from "./types.js";

const LINUX = { os: "linux", arch: "amd64" } as const;
const WINDOWS = { os: "windows", arch: "amd64" } as const;
const WIN_DIR = "C:\\Users\\test\\AppData\\Local\\meldoc\\bin";

const createMemoryStore = (
  initial: Partial<Record<PathScope, string>> = {}
): PathStore & { values: Partial<Record<PathScope, string>> } => {
  const values = { ...initial };
  return {
    values,
    read: async (scope) => values[scope] ?? "",
    write: async (scope, value) => {
      values[scope] = value;
    },
  };
};

describe("isOnPath", () => {
  test("unix entries match exactly, ignoring a trailing slash", () => {
    const pathValue = "/usr/bin:/home/test/.local/bin/";
    expect(isOnPath("/home/test/.local/bin", pathValue, LINUX)).toBe(true);
    expect(isOnPath("/home/test/.local/bin/", "/home/test/.local/bin", LINUX)).toBe(true);
    expect(isOnPath("/home/test/.local", pathValue, LINUX)).toBe(false);
    expect(isOnPath("/USR/BIN", pathValue, LINUX)).toBe(false);
  });

  test("windows entries match case-insensitively", () => {
    const pathValue = "C:\\Windows;c:\\users\\test\\appdata\\local\\meldoc\\bin\\";
    expect(isOnPath(WIN_DIR, pathValue, WINDOWS)).toBe(true);
    expect(isOnPath("C:\\Other", pathValue, WINDOWS)).toBe(false);
  });

  test("an unset path contains nothing", () => {
    expect(isOnPath("/usr/bin", undefined, LINUX)).toBe(false);
  });

  test("getPathValue falls back to Path", () => {
    expect(getPathValue({ PATH: "/a" })).toBe("/a");
    expect(getPathValue({ Path: "C:\\a" })).toBe("C:\\a");
    expect(getPathValue({})).toBeUndefined();
  });
});

describe("integratePath", () => {
  let home: string;
  const dir = "/opt/meldoc/bin";

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), "path-setup-test-"));
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  const unixOptions = (
    overrides: Partial<PathIntegrationOptions> = {}
  ): PathIntegrationOptions => ({
    dir,
    toolName: "meldoc",
    platform: LINUX,
    strategy: PLATFORM_STRATEGIES.linux,
    pathValue: "/usr/bin:/bin",
    home,
    global: false,
    setupPath: true,
    pathHint: true,
    pathStore: createMemoryStore(),
    ...overrides,
  });

  test("directory already on PATH needs nothing", async () => {
    await expect(
      integratePath(unixOptions({ pathValue: `/usr/bin:${dir}` }))
    ).resolves.toEqual({ kind: "on-path" });
  });

  test("appends to the first existing rc file exactly once", async () => {
    const bashrc = join(home, ".bashrc");
    await writeFile(bashrc, "alias ll='ls -l'\n");

    await expect(integratePath(unixOptions())).resolves.toEqual({
      kind: "configured",
      location: bashrc,
    });
    await expect(integratePath(unixOptions())).resolves.toEqual({
      kind: "already-configured",
      location: bashrc,
    });

    expect(await readFile(bashrc, "utf-8")).toBe(
      `alias ll='ls -l'\n\n# Added by meldoc installer\nexport PATH="${dir}:$PATH"\n`
    );
  });

  test("prefers .zshrc over bash files", async () => {
    await writeFile(join(home, ".bashrc"), "");
    await writeFile(join(home, ".zshrc"), "");

    await expect(integratePath(unixOptions())).resolves.toEqual({
      kind: "configured",
      location: join(home, ".zshrc"),
    });
    expect(await readFile(join(home, ".bashrc"), "utf-8")).toBe("");
  });

  test("fish config gets fish_add_path", async () => {
    const fishConfig = join(home, ".config", "fish", "config.fish");
    await mkdir(join(home, ".config", "fish"), { recursive: true });
    await writeFile(fishConfig, "");

    await integratePath(unixOptions());

    expect(await readFile(fishConfig, "utf-8")).toBe(
      `\n# Added by meldoc installer\nfish_add_path ${dir}\n`
    );
  });

  test("without an rc file the export line is printed instead", async () => {
    await expect(integratePath(unixOptions())).resolves.toEqual({
      kind: "manual",
      commands: [`export PATH="${dir}:$PATH"`],
      reason: "no shell startup file found",
    });
  });

  test("unix default prints the manual command for the rc file", async () => {
    const zshrc = join(home, ".zshrc");
    await writeFile(zshrc, "");

    await expect(
      integratePath(unixOptions({ setupPath: undefined }))
    ).resolves.toEqual({
      kind: "manual",
      commands: [`echo 'export PATH="${dir}:$PATH"' >> ${zshrc} && source ${zshrc}`],
      location: zshrc,
    });
    expect(await readFile(zshrc, "utf-8")).toBe("");
  });

  test("disabled hints skip PATH guidance entirely", async () => {
    await expect(
      integratePath(unixOptions({ setupPath: false, pathHint: false }))
    ).resolves.toEqual({ kind: "skipped" });
  });

  describe("windows", () => {
    const windowsOptions = (
      store: PathStore,
      overrides: Partial<PathIntegrationOptions> = {}
    ): PathIntegrationOptions => ({
      dir: WIN_DIR,
      toolName: "meldoc",
      platform: WINDOWS,
      strategy: PLATFORM_STRATEGIES.windows,
      pathValue: "C:\\Windows",
      home,
      global: false,
      pathHint: true,
      pathStore: store,
      ...overrides,
    });

    test("adds the directory to the user Path by default", async () => {
      const store = createMemoryStore({ User: "C:\\Tools;" });

      await expect(integratePath(windowsOptions(store))).resolves.toEqual({
        kind: "configured",
        location: "User Path",
      });
      expect(store.values.User).toBe(`C:\\Tools;${WIN_DIR}`);
    });

    test("is idempotent", async () => {
      const store = createMemoryStore({ User: "C:\\Tools" });

      await integratePath(windowsOptions(store));
      await expect(integratePath(windowsOptions(store))).resolves.toEqual({
        kind: "already-configured",
        location: "User Path",
      });
      expect(store.values.User).toBe(`C:\\Tools;${WIN_DIR}`);
    });

    test("global installs use the machine Path", async () => {
      const store = createMemoryStore({ Machine: "" });

      await integratePath(windowsOptions(store, { global: true }));

      expect(store.values.Machine).toBe(WIN_DIR);
      expect(store.values.User).toBeUndefined();
    });

    test("store failures degrade to manual instructions", async () => {
      const store: PathStore = {
        read: async () => "",
        write: async () => {
          throw new Error("access denied");
        },
      };

      const result = await integratePath(windowsOptions(store));

      expect(result).toEqual({
        kind: "manual",
        commands: [
          `[Environment]::SetEnvironmentVariable('Path', [Environment]::GetEnvironmentVariable('Path', 'User') + ';${WIN_DIR}', 'User')`,
        ],
        location: "User Path",
        reason: "could not update PATH in User Path: access denied",
      });
    });
  });
});

describe("createRegistryPathStore", () => {
  const createRunner = (): CommandRunner => ({
    run: vi.fn(async () => undefined),
    capture: vi.fn(async () => "C:\\Windows"),
  });

  test("reads through [Environment]", async () => {
    const runner = createRunner();
    const store = createRegistryPathStore(runner);

    await expect(store.read("User")).resolves.toBe("C:\\Windows");
    expect(runner.capture).toHaveBeenCalledWith("powershell", [
      "-NoProfile",
      "-NonInteractive",
      "-Command",
      "[Environment]::GetEnvironmentVariable('Path', 'User')",
    ]);
  });

  test("user writes run unelevated", async () => {
    const runner = createRunner();
    await createRegistryPathStore(runner).write("User", "C:\\a;C:\\b");

    expect(runner.run).toHaveBeenCalledWith("powershell", [
      "-NoProfile",
      "-NonInteractive",
      "-Command",
      "[Environment]::SetEnvironmentVariable('Path', 'C:\\a;C:\\b', 'User')",
    ]);
  });

  test("machine writes run elevated", async () => {
    const runner = createRunner();
    await createRegistryPathStore(runner).write("Machine", "C:\\a");

    expect(runner.run).toHaveBeenCalledWith(
      "powershell",
      expect.arrayContaining([expect.stringContaining("-Verb RunAs")])
    );
  });
});
