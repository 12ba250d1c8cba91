/**
 * Console output for the installer commands
 */

import type {
  InstallOutcome,
  Installation,
  OperatingSystem,
  PathIntegrationResult,
  Reporter,
} from "@meldoc-installer/core";
import { colors, paint } from "../tui/styles.js";
import { DOCS_URL } from "./config.js";

export interface ConsoleSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: ConsoleSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Reporter plus the extra line kinds the commands print themselves.
 * With `quiet`, only warnings and errors are written.
 */
export interface ConsoleReporter extends Reporter {
  info(message: string): void;
  error(message: string): void;
  /** Non-essential plain line (blank lines, summaries) */
  line(text?: string): void;
}

export const createConsoleReporter = (options: {
  quiet: boolean;
  color: boolean;
  sink?: ConsoleSink;
}): ConsoleReporter => {
  const { quiet, color } = options;
  const sink = options.sink ?? consoleSink;
  const out = (line: string): void => {
    if (!quiet) {
      sink.out(line);
    }
  };

  return {
    step: (message) => out(`${paint(colors.brand, "==>", color)} ${message}`),
    detail: (message) => out(`    ${paint(colors.muted, message, color)}`),
    success: (message) => out(`${paint(colors.success, "✓", color)} ${message}`),
    info: (message) => out(`${paint(colors.info, "ℹ", color)} ${message}`),
    warn: (message) => sink.err(`${paint(colors.warn, "⚠", color)} ${message}`),
    error: (message) => sink.err(`${paint(colors.error, "✗", color)} ${message}`),
    line: (text = "") => out(text),
  };
};

export const printFailure = (
  reporter: ConsoleReporter,
  message: string,
  hints: readonly string[]
): void => {
  reporter.error(message);
  for (const hint of hints) {
    reporter.warn(`  ${hint}`);
  }
};

/**
 * PATH follow-up for an install. Shell rc changes need the file sourced;
 * registry changes need a new terminal.
 */
export const printPathGuidance = (
  reporter: ConsoleReporter,
  result: PathIntegrationResult,
  context: { os: OperatingSystem; dir: string; toolName: string }
): void => {
  const reload = (location: string): string =>
    context.os === "windows"
      ? "  Open a new terminal to pick up the change."
      : `  To apply changes, run: source ${location}`;

  switch (result.kind) {
    case "on-path":
    case "skipped":
      return;
    case "configured":
      reporter.success(`Added ${context.dir} to PATH in ${result.location}`);
      reporter.line(reload(result.location));
      reporter.line();
      return;
    case "already-configured":
      reporter.info(`PATH already configured in ${result.location}`);
      reporter.line(
        context.os === "windows"
          ? `  If ${context.toolName} is not found, open a new terminal.`
          : `  If ${context.toolName} is not found, run: source ${result.location}`
      );
      reporter.line();
      return;
    case "manual":
      reporter.warn("PATH configuration needed");
      if (result.reason) {
        reporter.warn(`  ${result.reason}`);
      }
      reporter.warn("  Run this command to configure PATH:");
      for (const command of result.commands) {
        reporter.warn(`    ${command}`);
      }
      if (context.os !== "windows") {
        reporter.warn("  Or re-run the installer with --setup-path to configure it automatically.");
      }
      return;
  }
};

export const printInstallSummary = (
  reporter: ConsoleReporter,
  outcome: Extract<InstallOutcome, { kind: "installed" }>,
  toolName: string
): void => {
  reporter.line();
  reporter.success("Installation successful!");
  reporter.line();
  reporter.line(`  Location: ${outcome.destination}`);
  reporter.line(`  Version:  ${outcome.reportedVersion}`);
  reporter.line();
  reporter.line("  Get started:");
  reporter.line(`    $ ${toolName} --help`);
  reporter.line(`    $ ${toolName} init`);
  reporter.line();
  reporter.line(`  Documentation: ${DOCS_URL}`);
  reporter.line(
    outcome.elevated
      ? `  Uninstall:     sudo rm ${outcome.destination}`
      : `  Uninstall:     rm ${outcome.destination}`
  );
  reporter.line();
};

const COMPARISON_NOTES = {
  older: "a newer version is available",
  same: "already up to date",
  newer: "installed version is newer than the requested one",
  unknown: "could not compare versions",
} as const;

export const printAlreadyInstalled = (
  reporter: ConsoleReporter,
  outcome: Extract<InstallOutcome, { kind: "already-installed" }>
): void => {
  reporter.warn(`Already installed: ${outcome.destination}`);
  reporter.line(`  Installed: ${outcome.installedVersion}`);
  reporter.line(
    `  Requested: ${outcome.version.tag} (${COMPARISON_NOTES[outcome.comparison]})`
  );
  reporter.line("  Use --force to reinstall.");
  reporter.line();
};

export const printInstallation = (
  reporter: ConsoleReporter,
  installation: Installation
): void => {
  reporter.success("Found installation");
  reporter.line();
  reporter.line(`  Location: ${installation.path}`);
  reporter.line(`  Version:  ${installation.version}`);
  reporter.line();
};

const AFFIRMATIVE_ANSWERS = new Set(["y", "yes"]);

export const isAffirmative = (answer: string): boolean =>
  AFFIRMATIVE_ANSWERS.has(answer.trim().toLowerCase());
