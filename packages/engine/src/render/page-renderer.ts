import { renderWithBase, selectTemplate } from "../build/layout.ts";
import { baseTemplate, listTemplate, singleTemplate } from "../layouts.ts";
import type { LayoutEnvironment } from "../layouts.ts";
import type { Document, ListingPage, SiteConfig } from "../models/index.ts";
import { DocumentValue, ListingValue } from "../template/index.ts";

/** Produces the HTML for one Document or one listing page. */
export class PageRenderer {
  readonly config: SiteConfig;
  readonly env: LayoutEnvironment;
  private readonly basePath: string | undefined;

  constructor(config: SiteConfig, env: LayoutEnvironment) {
    this.config = config;
    this.env = env;
    this.basePath = selectTemplate(env, [baseTemplate]);
  }

  /** Raises TemplateResolutionError when either required template is absent. */
  ensureTemplates(): void {
    this.env.requireTemplate(singleTemplate);
    this.env.requireTemplate(listTemplate);
  }

  renderDocument(doc: Document): string {
    return renderWithBase(this.env, this.basePath, singleTemplate, new DocumentValue(doc, this.config), this.config);
  }

  renderListing(page: ListingPage): string {
    return renderWithBase(this.env, this.basePath, listTemplate, new ListingValue(page, this.config), this.config);
  }
}
