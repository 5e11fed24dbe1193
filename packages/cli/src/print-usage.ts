import { logLine } from "./log-line.ts";

export const printUsage = (): void => {
  logLine("quire - static pages and a search index from a folder of Markdown");
  logLine("");
  logLine("USAGE:");
  logLine("  quire [build] [options]");
  logLine("  quire new site <dir>");
  logLine("  quire new <name.md> [--source <dir>]");
  logLine("  quire version");
  logLine("  quire help");
  logLine("");
  logLine("BUILD OPTIONS:");
  logLine("  -s, --source <dir>         Site directory (default: cwd)");
  logLine("  -d, --destination <dir>    Output directory (default: outputDir from config)");
  logLine("  --baseURL <url>            Override baseURL");
  logLine("  --no-clean                 Do not wipe destination dir");
};
