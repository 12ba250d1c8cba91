/**
 * Debug logger for per-run troubleshooting (`--debug`).
 * Stores logs in $XDG_STATE_HOME/meldoc-installer/logs/<run-id>.log
 * (%LOCALAPPDATA%\meldoc-installer\logs on Windows).
 *
 * Features:
 * - Per-run log files (no overwriting)
 * - Timestamped entries and phase timings
 * - Automatic log rotation (keeps last 10 logs)
 */

import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readdirSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join, posix, win32 } from "node:path";
import type { Environment } from "@meldoc-installer/core";

const STATE_DIR_NAME = "meldoc-installer";
const LOG_DIR_NAME = "logs";
const MAX_LOG_FILES = 10;
const RUN_ID_UNSAFE_REGEX = /[:.]/g;

export const getLogDir = (
  platform: NodeJS.Platform,
  env: Environment,
  home: string
): string => {
  if (platform === "win32") {
    const base = env.LOCALAPPDATA || win32.join(home, "AppData", "Local");
    return win32.join(base, STATE_DIR_NAME, LOG_DIR_NAME);
  }
  const base = env.XDG_STATE_HOME || posix.join(home, ".local", "state");
  return posix.join(base, STATE_DIR_NAME, LOG_DIR_NAME);
};

export const createRunID = (now = new Date()): string =>
  `${now.toISOString().replace(RUN_ID_UNSAFE_REGEX, "-")}-${process.pid}`;

/**
 * Per-run debug logger. Write failures never interrupt the installer.
 */
export class DebugLogger {
  private readonly logPath: string;
  private closed = false;
  private phaseStartTimes = new Map<string, number>();

  constructor(runID: string, logDir: string) {
    this.logPath = this.initializeLogFile(runID, logDir);
    this.log("DebugLogger initialized");
  }

  private initializeLogFile(runID: string, logDir: string): string {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true, mode: 0o700 });
    }

    this.rotateLogs(logDir);

    const logPath = join(logDir, `${runID}.log`);
    const timestamp = this.formatTimestamp();
    const header = `${"=".repeat(80)}\nmeldoc installer debug log\nRun ID: ${runID}\nStarted: ${timestamp}\n${"=".repeat(80)}\n\n`;
    writeFileSync(logPath, header, { mode: 0o600 });

    return logPath;
  }

  /**
   * Keeps the MAX_LOG_FILES - 1 newest logs, leaving room for this run's.
   */
  private rotateLogs(logDir: string): void {
    try {
      const logFiles = readdirSync(logDir)
        .filter((file) => file.endsWith(".log"))
        .map((file) => {
          const filePath = join(logDir, file);
          return { path: filePath, mtime: statSync(filePath).mtime.getTime() };
        })
        .sort((a, b) => b.mtime - a.mtime);

      if (logFiles.length >= MAX_LOG_FILES) {
        for (const log of logFiles.slice(MAX_LOG_FILES - 1)) {
          try {
            unlinkSync(log.path);
          } catch {
            // Another run may have removed it
          }
        }
      }
    } catch {
      // Rotation is best-effort
    }
  }

  /**
   * ISO 8601 timestamp with local timezone offset.
   */
  private formatTimestamp(): string {
    const now = new Date();
    const offset = -now.getTimezoneOffset();
    const offsetHours = String(Math.floor(Math.abs(offset) / 60)).padStart(
      2,
      "0"
    );
    const offsetMinutes = String(Math.abs(offset) % 60).padStart(2, "0");
    const offsetSign = offset >= 0 ? "+" : "-";

    const iso = now.toISOString().slice(0, -1);
    return `${iso}${offsetSign}${offsetHours}:${offsetMinutes}`;
  }

  log(message: string): void {
    if (this.closed) {
      return;
    }

    try {
      appendFileSync(this.logPath, `${this.formatTimestamp()} ${message}\n`);
    } catch {
      // Logging must not crash the installer
    }
  }

  logError(error: unknown, context?: string): void {
    const prefix = context ? `[${context}] ` : "";

    if (error instanceof Error) {
      this.log(`${prefix}${error.name}: ${error.message}`);
      if (error.stack) {
        this.log(`Stack trace:\n${error.stack}`);
      }
    } else {
      this.log(`${prefix}Error: ${String(error)}`);
    }
  }

  /**
   * Logs resolved settings at the start of a run.
   */
  logHeader(settings: Readonly<Record<string, string | boolean | undefined>>): void {
    this.log("=".repeat(80));
    this.log("Configuration:");
    for (const [key, value] of Object.entries(settings)) {
      this.log(`  ${key}: ${value === undefined ? "(default)" : String(value)}`);
    }
    this.log("=".repeat(80));
    this.log("");
  }

  logEnvironment(): void {
    this.log("Environment:");
    this.log(`  OS: ${process.platform} ${process.arch}`);
    this.log(`  Node: ${process.version}`);
    this.log("");
  }

  startPhase(phase: string): void {
    this.phaseStartTimes.set(phase, Date.now());
    this.log(`[${phase}] Starting`);
  }

  endPhase(phase: string): void {
    const start = this.phaseStartTimes.get(phase);
    if (start !== undefined) {
      this.log(`[${phase}] Completed in ${Date.now() - start}ms`);
      this.phaseStartTimes.delete(phase);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.log("DebugLogger closed");
    this.log(`${"=".repeat(80)}\n`);
    this.closed = true;
  }

  get path(): string {
    return this.logPath;
  }
}

export const openDebugLogger = (env: Environment, home: string): DebugLogger =>
  new DebugLogger(createRunID(), getLogDir(process.platform, env, home));
