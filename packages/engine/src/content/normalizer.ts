import { Document, NormalizedMetadata, SiteConfig, TransformedDocument } from "../models/index.ts";
import { replaceExtension, stripExtension } from "../utils/text.ts";
import { contentExtension } from "./loader.ts";

export const defaultSummary = "No summary provided.";
export const defaultDate = "2025-01-01";
export const defaultImage = "images/default-cover.jpg";

export const toAbsoluteUrl = (baseURL: string, path: string): string => `${baseURL}/${path}`;

export class FieldNormalizer {
  private readonly config: SiteConfig;

  constructor(config: SiteConfig) {
    this.config = config;
  }

  normalizeMetadata(filename: string, transformed: TransformedDocument): NormalizedMetadata {
    const m = transformed.metadata;
    return new NormalizedMetadata(
      m.title ?? stripExtension(filename, contentExtension),
      m.summary ?? defaultSummary,
      m.date ?? defaultDate,
      m.image ?? defaultImage,
      m.extras,
    );
  }

  normalize(filename: string, rawText: string, transformed: TransformedDocument): Document {
    const metadata = this.normalizeMetadata(filename, transformed);
    const slug = replaceExtension(filename, contentExtension, ".html");
    return new Document(
      filename,
      rawText,
      transformed.body,
      metadata,
      slug,
      toAbsoluteUrl(this.config.baseURL, slug),
      toAbsoluteUrl(this.config.baseURL, metadata.image),
      transformed.readTime,
    );
  }
}
