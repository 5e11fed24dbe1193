import { join } from "node:path";
import { TemplateResolutionError } from "./errors.ts";
import { dirExists, fileExists, readTextFile } from "./fs.ts";
import { silentLogger } from "./log.ts";
import type { BuildLogger } from "./log.ts";
import { parseTemplate, TemplateEnvironment } from "./template/index.ts";
import type { Template } from "./template/index.ts";

export const singleTemplate = "single.html";
export const listTemplate = "list.html";
export const baseTemplate = "baseof.html";

export class LayoutEnvironment extends TemplateEnvironment {
  readonly templateDir: string;
  override readonly description: string;
  private readonly logger: BuildLogger;
  private readonly cache: Map<string, Template>;

  constructor(templateDir: string, logger: BuildLogger = silentLogger) {
    super();
    this.templateDir = templateDir;
    this.description = templateDir;
    this.logger = logger;
    this.cache = new Map<string, Template>();
  }

  override getTemplate(relPathRaw: string): Template | undefined {
    const relPath = relPathRaw.trim().replace(/^\/+/, "");
    const withExt = /\.[A-Za-z0-9]+$/.test(relPath) ? relPath : relPath + ".html";

    const cached = this.cache.get(withExt);
    if (cached !== undefined) return cached;

    const resolved = join(this.templateDir, ...withExt.split("/"));
    if (!fileExists(resolved)) return undefined;

    try {
      const tpl = parseTemplate(readTextFile(resolved));
      this.cache.set(withExt, tpl);
      return tpl;
    } catch (e) {
      this.logger.error(`Error parsing template: ${resolved}`);
      throw e;
    }
  }

  /** Like getTemplate, but a missing template root or file raises TemplateResolutionError. */
  requireTemplate(relPath: string): Template {
    if (!dirExists(this.templateDir)) throw new TemplateResolutionError(relPath, this.templateDir);
    const tpl = this.getTemplate(relPath);
    if (tpl === undefined) throw new TemplateResolutionError(relPath, this.templateDir);
    return tpl;
  }
}
