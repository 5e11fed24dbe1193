import { resolve } from "node:path";

import { BuildRequest, buildSite } from "@quire/engine";
import type { BuildLogger } from "@quire/engine";

import { logLine } from "../log-line.ts";

export const handleBuild = (args: readonly string[], buildArgStart: number, cwd: string, logger?: BuildLogger): number => {
  let buildSourceDir = cwd;
  let buildDestinationDir: string | undefined = undefined;
  let buildBaseURL: string | undefined = undefined;
  let cleanDestinationDir = true;

  for (let i = buildArgStart; i < args.length; i++) {
    const a = args[i];
    const next = args[i + 1];
    if ((a === "--source" || a === "-s") && next !== undefined) {
      buildSourceDir = resolve(cwd, next);
      i++;
    } else if ((a === "--destination" || a === "-d") && next !== undefined) {
      buildDestinationDir = resolve(cwd, next);
      i++;
    } else if ((a === "--baseURL" || a === "--baseurl") && next !== undefined) {
      buildBaseURL = next;
      i++;
    } else if (a === "--no-clean") {
      cleanDestinationDir = false;
    } else if (a === "--clean") {
      cleanDestinationDir = true;
    }
  }

  const buildReq = new BuildRequest(buildSourceDir);
  buildReq.destinationDir = buildDestinationDir;
  buildReq.baseURL = buildBaseURL;
  buildReq.cleanDestinationDir = cleanDestinationDir;
  if (logger !== undefined) buildReq.logger = logger;

  const result = buildSite(buildReq);
  if (result.status === "empty") {
    logLine(`Nothing to build → ${result.outputDir}`);
    return 0;
  }
  logLine(`Built → ${result.outputDir} (${result.pagesBuilt} pages)`);
  return 0;
};
