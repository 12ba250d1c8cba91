import { defineCommand } from "citty";
import { getVersion } from "../utils/version.js";

export const main = defineCommand({
  meta: {
    name: "meldoc-installer",
    version: getVersion(),
    description: "Install, update and remove the meldoc CLI",
  },
  subCommands: {
    install: () => import("./install.js").then((m) => m.installCommand),
    uninstall: () => import("./uninstall.js").then((m) => m.uninstallCommand),
    version: () => import("./version.js").then((m) => m.versionCommand),
  },
});
