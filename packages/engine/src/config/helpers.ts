import { isAbsolute, join } from "node:path";
import { fileExists } from "../fs.ts";

export const tryGetFirstExisting = (paths: readonly string[]): string | undefined => {
  for (const p of paths) {
    if (fileExists(p)) return p;
  }
  return undefined;
};

export const resolveSitePath = (siteDir: string, path: string): string => (isAbsolute(path) ? path : join(siteDir, path));
