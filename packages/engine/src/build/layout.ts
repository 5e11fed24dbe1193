import type { LayoutEnvironment } from "../layouts.ts";
import type { SiteConfig } from "../models/index.ts";
import type { TemplateValue } from "../template/index.ts";

/** First candidate that exists in the template root. */
export const selectTemplate = (env: LayoutEnvironment, candidates: readonly string[]): string | undefined =>
  candidates.find((p) => env.getTemplate(p) !== undefined);

/**
 * Renders `mainPath`, through `basePath` when that template exists: the main template's
 * `define`s then fill the base's `block`s.
 */
export const renderWithBase = (
  env: LayoutEnvironment,
  basePath: string | undefined,
  mainPath: string,
  root: TemplateValue,
  site: SiteConfig,
): string => {
  const main = env.requireTemplate(mainPath);

  if (basePath !== undefined) {
    const base = env.getTemplate(basePath);
    if (base !== undefined) return base.render(root, site, env, main.defines);
  }

  return main.render(root, site, env);
};
