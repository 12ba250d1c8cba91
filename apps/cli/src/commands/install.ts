import { homedir } from "node:os";
import {
  detectHost,
  formatError,
  runInstall,
  type PhaseListener,
} from "@meldoc-installer/core";
import { defineCommand } from "citty";
import { type InstallOptions, resolveInstallConfig } from "../lib/config.js";
import { describeFailure } from "../lib/errors.js";
import {
  createConsoleReporter,
  printAlreadyInstalled,
  printFailure,
  printInstallSummary,
  printPathGuidance,
} from "../lib/ui.js";
import { printHeader } from "../tui/header.js";
import { supportsColor } from "../tui/styles.js";
import { type DebugLogger, openDebugLogger } from "../utils/debug-logger.js";
import { createSignalController } from "../utils/signal.js";

export const installCommand = defineCommand({
  meta: {
    name: "install",
    description: "Download and install the meldoc CLI",
  },
  args: {
    global: {
      type: "boolean",
      description: "Install system-wide (elevates only for the final copy)",
      default: false,
    },
    dir: {
      type: "string",
      description: "Install to a specific directory (overrides MELDOC_INSTALL_DIR)",
    },
    version: {
      type: "string",
      description: "Version to install (default: latest, or MELDOC_VERSION)",
    },
    force: {
      type: "boolean",
      description: "Overwrite an existing installation",
      default: false,
    },
    quiet: {
      type: "boolean",
      description: "Minimal output; prints only the installed path",
      alias: "q",
      default: false,
    },
    "path-hint": {
      type: "boolean",
      description: "Show PATH configuration hints (disable with --no-path-hint)",
      default: true,
    },
    "setup-path": {
      type: "boolean",
      description: "Add the install directory to PATH (edits your shell config)",
      default: false,
    },
    "path-setup": {
      type: "boolean",
      description: "Allow PATH edits at all (disable with --no-path-setup)",
      default: true,
    },
    debug: {
      type: "boolean",
      description: "Write a debug log for this run",
      default: false,
    },
  },
  run: async ({ args }) => {
    const options: InstallOptions = {
      global: args.global === true,
      dir: typeof args.dir === "string" ? args.dir : undefined,
      version: typeof args.version === "string" ? args.version : undefined,
      force: args.force === true,
      quiet: args.quiet === true,
      pathHint: args["path-hint"] !== false,
      setupPath: args["setup-path"] === true,
      noPathSetup: args["path-setup"] === false,
    };

    const reporter = createConsoleReporter({
      quiet: options.quiet,
      color: supportsColor(process.stdout),
    });

    const resolved = resolveInstallConfig(options, process.env);
    if (!resolved.ok) {
      reporter.error(resolved.error);
      process.exit(1);
    }
    const { config } = resolved;
    const home = homedir();

    if (!config.quiet) {
      printHeader("install");
    }

    let logger: DebugLogger | undefined;
    if (args.debug === true) {
      try {
        logger = openDebugLogger(process.env, home);
        logger.logHeader({
          version: config.requestedVersion,
          targetDir: config.targetDir,
          global: config.global,
          force: config.force,
          setupPath: config.setupPath,
          versionSource: config.versionSource.kind,
        });
        logger.logEnvironment();
      } catch (error) {
        reporter.warn(`Could not open debug log: ${formatError(error)}`);
      }
    }

    const onPhase: PhaseListener | undefined = logger
      ? (phase, state) =>
          state === "start" ? logger?.startPhase(phase) : logger?.endPhase(phase)
      : undefined;

    const signalCtrl = createSignalController();
    try {
      const outcome = await runInstall(config, {
        reporter,
        host: detectHost(),
        env: process.env,
        homeDir: home,
        signal: signalCtrl.signal,
        onPhase,
      });
      signalCtrl.cleanup();
      logger?.log(`Outcome: ${outcome.kind} ${outcome.destination}`);

      if (outcome.kind === "already-installed") {
        printAlreadyInstalled(reporter, outcome);
      } else {
        if (config.quiet) {
          console.log(outcome.destination);
        }
        printInstallSummary(reporter, outcome, config.toolName);
        printPathGuidance(reporter, outcome.path, {
          os: outcome.platform.os,
          dir: outcome.targetDir,
          toolName: config.toolName,
        });
      }
    } catch (error) {
      signalCtrl.cleanup();
      logger?.logError(error, "install");

      const failure = describeFailure(error, {
        aborted: signalCtrl.aborted,
        releasesUrl: config.releasesUrl,
      });
      printFailure(reporter, failure.message, failure.hints);
      if (logger) {
        reporter.warn(`Debug log: ${logger.path}`);
        logger.close();
      }
      process.exit(failure.exitCode);
    }

    if (logger) {
      reporter.detail(`Debug log: ${logger.path}`);
      logger.close();
    }
  },
});
