import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { FieldNormalizer } from "../content/normalizer.ts";
import { DocumentTransformer } from "../content/transformer.ts";
import { defaultSiteConfig } from "../models/index.ts";
import type { Document, SiteConfig } from "../models/index.ts";

export const createTempDir = (name: string): string => mkdtempSync(join(tmpdir(), `quire-tests-${name}-`));

export const deleteIfExists = (path: string): void => {
  rmSync(path, { recursive: true, force: true });
};

export const makeDocument = (
  filename: string,
  rawText: string,
  config: SiteConfig = defaultSiteConfig(),
): Document => {
  const transformed = new DocumentTransformer().transform(rawText);
  return new FieldNormalizer(config).normalize(filename, rawText, transformed);
};

export const datedDocument = (filename: string, date: string): Document =>
  makeDocument(filename, `title: ${filename}\ndate: ${date}\n\nBody of ${filename}.`);
