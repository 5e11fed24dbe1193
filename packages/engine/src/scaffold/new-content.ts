import { basename, resolve } from "node:path";
import { loadSiteConfig } from "../config/loader.ts";
import { contentExtension } from "../content/loader.ts";
import { ScaffoldError } from "../errors.ts";
import { fileExists, writeTextFile } from "../fs.ts";
import { humanizeSlug, slugify, stripExtension } from "../utils/text.ts";
import { isoDate } from "./init-site.ts";

const newDocument = (title: string, date: string): string => `---
title: ${title}
date: ${date}
summary:
---

Write your document here.
`;

/** Creates `<contentDir>/<name>.md` with a metadata block and returns its path. Never overwrites. */
export const newContent = (siteDir: string, nameRaw: string, now: Date = new Date()): string => {
  const dir = resolve(siteDir);
  const config = loadSiteConfig(dir).config;

  const name = basename(nameRaw.trim());
  const fileName = name.endsWith(contentExtension) ? name : name + contentExtension;
  const dest = resolve(dir, config.contentDir, fileName);
  if (fileExists(dest)) throw new ScaffoldError("File already exists", dest);

  const title = humanizeSlug(slugify(stripExtension(fileName, contentExtension)));
  writeTextFile(dest, newDocument(title, isoDate(now)));
  return dest;
};
