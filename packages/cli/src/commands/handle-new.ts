import { resolve } from "node:path";

import { initSite, newContent } from "@quire/engine";

import { logErrorLine } from "../log-error-line.ts";
import { logLine } from "../log-line.ts";

export const handleNew = (args: readonly string[], cwd: string): number => {
  const target = args[1];
  if (target === "site") {
    const dir = args[2];
    if (dir === undefined) {
      logErrorLine("Missing <dir> for `quire new site`");
      return 2;
    }
    initSite(resolve(cwd, dir));
    logLine(`Created site: ${dir}`);
    return 0;
  }

  if (target === undefined) {
    logErrorLine("Missing <name.md> for `quire new`");
    return 2;
  }

  let contentSourceDir = cwd;
  for (let i = 2; i < args.length; i++) {
    const a = args[i];
    const next = args[i + 1];
    if ((a === "--source" || a === "-s") && next !== undefined) {
      contentSourceDir = resolve(cwd, next);
      i++;
    }
  }

  const created = newContent(contentSourceDir, target);
  logLine(`Created content: ${created}`);
  return 0;
};
