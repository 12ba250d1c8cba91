import { createReadStream, openSync } from "node:fs";
import type { Readable } from "node:stream";
import { isAffirmative } from "./ui.js";

interface TerminalInput {
  readonly stream: Readable;
  readonly close: () => void;
}

/**
 * stdin when it is a terminal, otherwise the controlling terminal, so the
 * prompt still works when the script itself arrives on stdin.
 */
const openTerminalInput = (): TerminalInput | undefined => {
  if (process.stdin.isTTY) {
    return { stream: process.stdin, close: () => undefined };
  }
  if (process.platform === "win32") {
    return undefined;
  }
  try {
    const stream = createReadStream("", { fd: openSync("/dev/tty", "r") });
    return { stream, close: () => stream.destroy() };
  } catch {
    return undefined;
  }
};

/**
 * Asks a yes/no question. Anything but y/yes, or no terminal at all,
 * counts as no.
 */
export const confirm = async (message: string): Promise<boolean> => {
  const input = openTerminalInput();
  if (!input) {
    return false;
  }

  const readline = await import("node:readline");
  const rl = readline.createInterface({
    input: input.stream,
    output: process.stdout,
  });

  const answer = await new Promise<string>((resolve) => {
    rl.once("close", () => resolve(""));
    rl.question(`${message} (y/N): `, resolve);
  });
  rl.close();
  input.close();

  return isAffirmative(answer);
};
