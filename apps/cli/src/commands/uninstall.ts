import { homedir } from "node:os";
import {
  classifyPlatform,
  createCommandRunner,
  detectHost,
  findInstallation,
  findOnPath,
  findStateDirs,
  formatError,
  getBinaryName,
  getCommonInstallDirs,
  getPathValue,
  removeBinary,
  removeStateDirs,
  type PlatformTag,
} from "@meldoc-installer/core";
import { defineCommand } from "citty";
import { TOOL_NAME } from "../lib/config.js";
import { confirm } from "../lib/prompt.js";
import {
  type ConsoleReporter,
  createConsoleReporter,
  printInstallation,
} from "../lib/ui.js";
import { printHeader } from "../tui/header.js";
import { supportsColor } from "../tui/styles.js";
import { type DebugLogger, openDebugLogger } from "../utils/debug-logger.js";

const STATE_DIR_NAME = ".meldoc";

const removeProjectState = async (
  reporter: ConsoleReporter,
  home: string,
  assumeYes: boolean
): Promise<void> => {
  reporter.step("Searching for project state directories...");
  const dirs = await findStateDirs(home, STATE_DIR_NAME);
  if (dirs.length === 0) {
    reporter.detail(`No ${STATE_DIR_NAME} directories found`);
    return;
  }

  reporter.line(`  Found ${dirs.length} ${STATE_DIR_NAME} director${dirs.length === 1 ? "y" : "ies"}:`);
  for (const dir of dirs) {
    reporter.line(`    ${dir}`);
  }
  reporter.line();

  const proceed =
    assumeYes || (await confirm(`Remove all ${STATE_DIR_NAME} directories?`));
  if (!proceed) {
    reporter.info(`Keeping ${STATE_DIR_NAME} directories`);
    return;
  }

  const { removed, failed } = await removeStateDirs(dirs);
  if (removed.length > 0) {
    reporter.success(`Removed ${removed.length} ${STATE_DIR_NAME} director${removed.length === 1 ? "y" : "ies"}`);
  }
  for (const failure of failed) {
    reporter.warn(`Could not remove ${failure.path}: ${failure.reason}`);
  }
};

export const uninstallCommand = defineCommand({
  meta: {
    name: "uninstall",
    description: "Remove the meldoc CLI",
  },
  args: {
    yes: {
      type: "boolean",
      description: "Skip confirmation prompts",
      alias: "y",
      default: false,
    },
    "keep-data": {
      type: "boolean",
      description: `Keep ${STATE_DIR_NAME} project directories`,
      default: false,
    },
    debug: {
      type: "boolean",
      description: "Write a debug log for this run",
      default: false,
    },
  },
  run: async ({ args }) => {
    const assumeYes = args.yes === true;
    const reporter = createConsoleReporter({
      quiet: false,
      color: supportsColor(process.stdout),
    });
    const home = homedir();

    printHeader("uninstall");

    let logger: DebugLogger | undefined;
    if (args.debug === true) {
      try {
        logger = openDebugLogger(process.env, home);
        logger.logHeader({ yes: assumeYes, keepData: args["keep-data"] === true });
        logger.logEnvironment();
      } catch (error) {
        reporter.warn(`Could not open debug log: ${formatError(error)}`);
      }
    }

    const fail = (message: string): never => {
      reporter.error(message);
      logger?.log(`Failed: ${message}`);
      logger?.close();
      process.exit(1);
    };

    let platform: PlatformTag;
    try {
      const host = detectHost();
      platform = classifyPlatform(host.kernel, host.machine);
    } catch (error) {
      return fail(formatError(error));
    }

    reporter.step(`Looking for ${TOOL_NAME}...`);
    const installation = await findInstallation(TOOL_NAME, {
      pathValue: getPathValue(process.env),
      platform,
      home,
      env: process.env,
    });

    if (!installation) {
      reporter.error(`${TOOL_NAME} is not installed`);
      reporter.line("  Searched PATH and:");
      for (const dir of getCommonInstallDirs(TOOL_NAME, { platform, home, env: process.env })) {
        reporter.line(`    ${dir}`);
      }
      return fail(`${TOOL_NAME} not found`);
    }
    logger?.log(`Found ${installation.path} (${installation.version})`);

    printInstallation(reporter, installation);

    const proceed =
      assumeYes || (await confirm(`Remove ${installation.path}?`));
    if (!proceed) {
      reporter.warn("Uninstall cancelled");
      logger?.close();
      return;
    }

    logger?.startPhase("remove");
    try {
      const { elevated } = await removeBinary(installation.path, {
        platform,
        runner: createCommandRunner(),
      });
      reporter.success(
        elevated ? `Removed ${installation.path} (elevated)` : `Removed ${installation.path}`
      );
    } catch (error) {
      logger?.logError(error, "remove");
      return fail(formatError(error));
    }
    logger?.endPhase("remove");

    if (args["keep-data"] === true) {
      reporter.info(`Keeping ${STATE_DIR_NAME} directories (--keep-data)`);
    } else {
      await removeProjectState(reporter, home, assumeYes);
    }

    reporter.line();
    const remaining = await findOnPath(
      getBinaryName(TOOL_NAME, platform),
      getPathValue(process.env),
      platform
    );
    if (remaining) {
      reporter.warn(`${TOOL_NAME} is still on PATH at ${remaining}`);
      reporter.warn("  Another copy may be installed; run this command again to remove it.");
      if (platform.os !== "windows") {
        reporter.warn("  If it was just removed, refresh your shell's command cache: hash -r");
      }
    } else {
      reporter.success(`${TOOL_NAME} has been completely removed`);
    }

    if (logger) {
      reporter.detail(`Debug log: ${logger.path}`);
      logger.close();
    }
  },
});
