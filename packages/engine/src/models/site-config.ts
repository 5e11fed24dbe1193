import { trimTrailingSlashes } from "../utils/text.ts";

export class SiteConfig {
  readonly title: string;
  /** Always stored without trailing slashes. */
  readonly baseURL: string;
  readonly domain: string | undefined;
  readonly languageCode: string;
  readonly pageCapacity: number;
  readonly listingTitle: string;
  readonly contentDir: string;
  readonly outputDir: string;
  readonly templateDir: string;
  readonly imagesDir: string;
  readonly params: ReadonlyMap<string, string>;

  constructor(init: {
    title: string;
    baseURL: string;
    domain: string | undefined;
    languageCode: string;
    pageCapacity: number;
    listingTitle: string;
    contentDir: string;
    outputDir: string;
    templateDir: string;
    imagesDir: string;
    params: ReadonlyMap<string, string>;
  }) {
    this.title = init.title;
    this.baseURL = trimTrailingSlashes(init.baseURL);
    this.domain = init.domain;
    this.languageCode = init.languageCode;
    this.pageCapacity = init.pageCapacity;
    this.listingTitle = init.listingTitle;
    this.contentDir = init.contentDir;
    this.outputDir = init.outputDir;
    this.templateDir = init.templateDir;
    this.imagesDir = init.imagesDir;
    this.params = init.params;
  }

  withOverrides(overrides: { baseURL?: string; outputDir?: string }): SiteConfig {
    return new SiteConfig({
      ...this,
      baseURL: overrides.baseURL ?? this.baseURL,
      outputDir: overrides.outputDir ?? this.outputDir,
    });
  }
}

export const defaultSiteConfig = (): SiteConfig =>
  new SiteConfig({
    title: "Quire Site",
    baseURL: "",
    domain: undefined,
    languageCode: "en-us",
    pageCapacity: 6,
    listingTitle: "Home",
    contentDir: "content",
    outputDir: "docs",
    templateDir: "templates",
    imagesDir: "images",
    params: new Map<string, string>(),
  });
