import { SiteConfig } from "../models/index.ts";

export class LoadedConfig {
  /** Undefined when no configuration file was found and defaults apply. */
  readonly path: string | undefined;
  readonly config: SiteConfig;

  constructor(path: string | undefined, config: SiteConfig) {
    this.path = path;
    this.config = config;
  }
}
