import { join } from "node:path";
import { parse } from "yaml";
import type { ZodError } from "zod";
import { ConfigError } from "../errors.ts";
import { readTextFile } from "../fs.ts";
import { SiteConfig, defaultSiteConfig } from "../models/index.ts";
import { LoadedConfig } from "./loaded-config.ts";
import { tryGetFirstExisting } from "./helpers.ts";
import { siteConfigSchema } from "./schema.ts";
import type { SiteConfigData } from "./schema.ts";

export const configFileNames = ["quire.yaml", "quire.yml", "quire.json"] as const;

const toSiteConfig = (data: SiteConfigData): SiteConfig =>
  new SiteConfig({
    title: data.title,
    baseURL: data.baseURL,
    domain: data.domain,
    languageCode: data.languageCode,
    pageCapacity: data.pageCapacity,
    listingTitle: data.listingTitle,
    contentDir: data.contentDir,
    outputDir: data.outputDir,
    templateDir: data.templateDir,
    imagesDir: data.imagesDir,
    params: new Map<string, string>(Object.entries(data.params)),
  });

const describeZodError = (err: ZodError): string =>
  err.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");

/** Parses configuration text; JSON goes through the same parser since it is a YAML subset. */
export const parseSiteConfig = (text: string, sourcePath: string): SiteConfig => {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (err) {
    throw new ConfigError(sourcePath, err instanceof Error ? err.message : String(err));
  }

  const result = siteConfigSchema.safeParse(raw ?? {});
  if (!result.success) throw new ConfigError(sourcePath, describeZodError(result.error));
  return toSiteConfig(result.data);
};

export const loadSiteConfig = (siteDir: string): LoadedConfig => {
  const candidates: string[] = [];
  for (const name of configFileNames) candidates.push(join(siteDir, name));

  const path = tryGetFirstExisting(candidates);
  if (path === undefined) return new LoadedConfig(undefined, defaultSiteConfig());

  return new LoadedConfig(path, parseSiteConfig(readTextFile(path), path));
};
