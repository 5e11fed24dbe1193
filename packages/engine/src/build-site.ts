import { join, resolve } from "node:path";
import { BuildResult } from "./build.ts";
import type { BuildRequest } from "./build.ts";
import { resolveSitePath } from "./config/helpers.ts";
import { loadSiteConfig } from "./config/loader.ts";
import { loadDocuments } from "./content/loader.ts";
import type { SourceDocument } from "./content/loader.ts";
import { FieldNormalizer } from "./content/normalizer.ts";
import { orderByDateDescending } from "./content/order.ts";
import { paginate } from "./content/paginate.ts";
import { buildSearchIndex, searchIndexFileName, serializeSearchIndex } from "./content/search-index.ts";
import { DocumentTransformer } from "./content/transformer.ts";
import { MissingContentRootError } from "./errors.ts";
import { fileExists, writeTextFile } from "./fs.ts";
import { LayoutEnvironment } from "./layouts.ts";
import type { Document, SiteConfig } from "./models/index.ts";
import { copyImages, prepareOutputDir, writeDomainMarker, writeSyntaxStylesheet } from "./output.ts";
import {
  feedFileName, renderRobotsTxt, renderRss, renderSitemap, robotsFileName, sitemapFileName,
} from "./outputs.ts";
import { PageRenderer } from "./render/page-renderer.ts";

const resolveConfig = (siteDir: string, request: BuildRequest): SiteConfig => {
  const config = loadSiteConfig(siteDir).config;
  const baseURL = request.baseURL !== undefined && request.baseURL.trim() !== "" ? request.baseURL.trim() : undefined;
  return config.withOverrides({ baseURL, outputDir: request.destinationDir });
};

const readSources = (contentDir: string, request: BuildRequest): SourceDocument[] => {
  try {
    return loadDocuments(contentDir);
  } catch (err) {
    if (!(err instanceof MissingContentRootError)) throw err;
    request.logger.warn(`${err.message}; continuing with an empty collection`);
    return [];
  }
};

/** Writes `content` unless a file already sits at `path`. */
const writeIfAbsent = (path: string, content: string): boolean => {
  if (fileExists(path)) return false;
  writeTextFile(path, content);
  return true;
};

export const buildSite = (request: BuildRequest): BuildResult => {
  const log = request.logger;
  const siteDir = resolve(request.siteDir);
  const config = resolveConfig(siteDir, request);
  const outDir = resolveSitePath(siteDir, config.outputDir);
  const contentDir = resolveSitePath(siteDir, config.contentDir);

  prepareOutputDir(outDir, request.cleanDestinationDir);
  log.info(`Prepared output directory ${outDir}`);

  if (config.domain !== undefined && config.domain.trim() !== "") {
    writeDomainMarker(outDir, config.domain.trim());
    log.info(`Wrote domain marker for ${config.domain.trim()}`);
  }

  const images = copyImages(join(contentDir, config.imagesDir), outDir);
  log.info(`Copied ${images} image(s)`);

  writeSyntaxStylesheet(outDir);
  log.info("Exported syntax stylesheet");

  const sources = readSources(contentDir, request);
  const transformer = new DocumentTransformer();
  const normalizer = new FieldNormalizer(config);
  const docs: Document[] = sources.map((src) =>
    normalizer.normalize(src.filename, src.rawText, transformer.transform(src.rawText)),
  );
  log.info(`Parsed ${docs.length} document(s)`);

  if (docs.length === 0) {
    log.warn("No documents found; nothing to build");
    return BuildResult.empty(outDir);
  }

  const ordered = orderByDateDescending(docs);
  const renderer = new PageRenderer(config, new LayoutEnvironment(resolveSitePath(siteDir, config.templateDir), log));
  renderer.ensureTemplates();

  // Render everything before the first write.
  const pages = paginate(ordered, config.pageCapacity);
  const documentPages = ordered.map((doc) => ({ path: join(outDir, doc.slug), html: renderer.renderDocument(doc) }));
  const listingPages = pages.map((page) => ({ path: join(outDir, page.fileName), html: renderer.renderListing(page) }));

  const records = buildSearchIndex(ordered);
  writeTextFile(join(outDir, searchIndexFileName), serializeSearchIndex(records));
  log.info(`Wrote search index with ${records.length} record(s)`);

  for (const page of documentPages) writeTextFile(page.path, page.html);
  log.info(`Rendered ${documentPages.length} document page(s)`);

  for (const page of listingPages) writeTextFile(page.path, page.html);
  log.info(`Rendered ${listingPages.length} listing page(s)`);

  if (config.baseURL === "") log.warn("No baseURL configured; sitemap and feed links are root-relative");

  const now = new Date();
  const sitemapPaths = [...pages.map((p) => p.fileName), ...ordered.map((d) => d.slug)];
  let feeds = 0;
  if (writeIfAbsent(join(outDir, sitemapFileName), renderSitemap(config, sitemapPaths, now))) feeds++;
  if (writeIfAbsent(join(outDir, feedFileName), renderRss(config, ordered, now))) feeds++;
  if (writeIfAbsent(join(outDir, robotsFileName), renderRobotsTxt(config))) feeds++;
  log.info(`Wrote ${feeds} feed file(s)`);

  const result = new BuildResult("built", outDir, ordered.length, pages.length, records.length, ordered.length + pages.length + feeds);
  log.info(`Build complete: ${result.pagesBuilt} file(s) in ${outDir}`);
  return result;
};
