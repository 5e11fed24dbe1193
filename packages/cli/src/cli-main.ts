import type { BuildLogger } from "@quire/engine";

import { handleBuild } from "./commands/handle-build.ts";
import { handleNew } from "./commands/handle-new.ts";
import { logErrorLine } from "./log-error-line.ts";
import { logLine } from "./log-line.ts";
import { printUsage } from "./print-usage.ts";

export const VERSION = "0.1.0";

const buildAliases = new Set(["build", "gen", "generate"]);

const dispatch = (args: readonly string[], cwd: string, logger: BuildLogger | undefined): number => {
  const first = args[0] ?? "";
  if (first === "-h" || first === "--help" || first === "help") {
    printUsage();
    return 0;
  }

  if (first === "-v" || first === "--version" || first === "version") {
    logLine(VERSION);
    return 0;
  }

  const cmd = first === "" || first.startsWith("-") ? "build" : first;

  if (cmd === "new") return handleNew(args, cwd);

  if (!buildAliases.has(cmd)) {
    logErrorLine(`Unknown command: ${cmd}`);
    printUsage();
    return 2;
  }

  return handleBuild(args, buildAliases.has(first) ? 1 : 0, cwd, logger);
};

/** Runs one command and returns the process exit code; fatal errors are reported, not thrown. */
export const main = (args: readonly string[], cwd: string = process.cwd(), logger?: BuildLogger): number => {
  try {
    return dispatch(args, cwd, logger);
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    logErrorLine(`${err.name}: ${err.message}`);
    return 1;
  }
};
