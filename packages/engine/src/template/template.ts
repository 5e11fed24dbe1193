import type { SiteConfig } from "../models/index.ts";
import type { TemplateEnvironment } from "./environment.ts";
import { renderNodes } from "./nodes.ts";
import type { Defines, TemplateNode } from "./nodes.ts";
import { RenderScope } from "./scope.ts";
import type { TemplateValue } from "./values.ts";

const noDefines: Defines = new Map<string, readonly TemplateNode[]>();

export class Template {
  readonly nodes: readonly TemplateNode[];
  readonly defines: Defines;

  constructor(nodes: readonly TemplateNode[], defines: Defines) {
    this.nodes = nodes;
    this.defines = defines;
  }

  /** `overrides` replaces `block` bodies; a page template's `define`s are passed here when it renders through a base. */
  render(root: TemplateValue, site: SiteConfig, env: TemplateEnvironment, overrides: Defines = noDefines): string {
    const out: string[] = [];
    const scope = new RenderScope(root, root, site, env, undefined);
    renderNodes(this.nodes, out, scope, overrides, this.defines);
    return out.join("");
  }
}
