import type { Template } from "./template.ts";

/** Where templates come from. Lookups return undefined for a missing template. */
export abstract class TemplateEnvironment {
  abstract readonly description: string;

  abstract getTemplate(relPath: string): Template | undefined;

  getPartial(name: string): Template | undefined {
    return this.getTemplate(`partials/${name}`);
  }
}
