export { initSite } from "./scaffold/init-site.ts";
export { newContent } from "./scaffold/new-content.ts";
export { buildSite } from "./build-site.ts";

export { BuildRequest, BuildResult } from "./build.ts";
export type { BuildStatus } from "./build.ts";
export { consoleLogger, silentLogger } from "./log.ts";
export type { BuildLogger } from "./log.ts";
export {
  ConfigError, MissingContentRootError, OutputPreparationError, ScaffoldError,
  TemplateExecutionError, TemplateResolutionError,
} from "./errors.ts";
export { configFileNames, loadSiteConfig, parseSiteConfig } from "./config/loader.ts";
export { loadDocuments, SourceDocument } from "./content/loader.ts";
export { DocumentTransformer } from "./content/transformer.ts";
export { FieldNormalizer } from "./content/normalizer.ts";
export { orderByDateDescending } from "./content/order.ts";
export { paginate } from "./content/paginate.ts";
export { buildSearchIndex, serializeSearchIndex } from "./content/search-index.ts";
export { PageRenderer } from "./render/page-renderer.ts";
export { LayoutEnvironment } from "./layouts.ts";
export * from "./models/index.ts";
