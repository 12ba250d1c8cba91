import { getVersion } from "../utils/version.js";
import { colors, paint, supportsColor } from "./styles.js";

export const printHeader = (command: string): void => {
  const color = supportsColor(process.stdout);
  console.log();
  console.log(
    `${paint(colors.brand, `meldoc installer v${getVersion()}`, color)} ${command}`
  );
  console.log();
};
