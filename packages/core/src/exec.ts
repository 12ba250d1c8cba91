import { execFile, spawn } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

const VERSION_PROBE_TIMEOUT_MS = 5000;

/**
 * Runs external commands. Privileged steps (sudo, elevated PowerShell) and
 * registry access go through this seam so tests can substitute it.
 */
export interface CommandRunner {
  /** Runs with inherited stdio (so sudo can prompt); rejects on non-zero exit */
  run(command: string, args: readonly string[]): Promise<void>;
  /** Runs silently and resolves to trimmed stdout */
  capture(command: string, args: readonly string[]): Promise<string>;
}

export const createCommandRunner = (): CommandRunner => ({
  run: (command, args) =>
    new Promise((resolve, reject) => {
      const child = spawn(command, [...args], { stdio: "inherit" });

      child.on("error", reject);
      child.on("close", (code) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(`${command} exited with code ${code ?? "null"}`));
        }
      });
    }),
  capture: async (command, args) => {
    const { stdout } = await execFileAsync(command, [...args], {
      windowsHide: true,
    });
    return stdout.trim();
  },
});

/**
 * Asks an installed binary for its version (`<binary> version`), returning
 * the first output line or "unknown".
 */
export const probeInstalledVersion = async (
  binaryPath: string
): Promise<string> => {
  try {
    const { stdout } = await execFileAsync(binaryPath, ["version"], {
      timeout: VERSION_PROBE_TIMEOUT_MS,
      windowsHide: true,
    });
    const firstLine = stdout.trim().split("\n")[0]?.trim();
    return firstLine || "unknown";
  } catch {
    return "unknown";
  }
};

const VERSION_IN_TEXT_REGEX = /v?(\d+\.\d+\.\d+(?:[-+][0-9A-Za-z.+-]+)?)/;

/**
 * Extracts a semantic version from free-form `version` output,
 * e.g. "meldoc version v1.4.0 (abc123)" -> "1.4.0".
 */
export const extractVersion = (output: string): string | undefined =>
  output.match(VERSION_IN_TEXT_REGEX)?.[1];

/**
 * Single-quotes a value for a PowerShell command line.
 */
export const quotePowerShell = (value: string): string =>
  `'${value.replaceAll("'", "''")}'`;

/**
 * Wraps a PowerShell script so it runs in an elevated (UAC) PowerShell,
 * propagating the inner exit code.
 */
export const elevatedPowerShellArgs = (script: string): string[] => {
  const encoded = Buffer.from(
    `$ErrorActionPreference = 'Stop'\n${script}`,
    "utf16le"
  ).toString("base64");
  const outer = [
    "$p = Start-Process -FilePath powershell -Verb RunAs -Wait -PassThru",
    `-ArgumentList '-NoProfile','-NonInteractive','-EncodedCommand','${encoded}';`,
    "exit $p.ExitCode",
  ].join(" ");
  return ["-NoProfile", "-NonInteractive", "-Command", outer];
};
