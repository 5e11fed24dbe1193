export { SiteConfig, defaultSiteConfig } from "./site-config.ts";
export { Document, DocumentMetadata, NormalizedMetadata, TransformedDocument } from "./document.ts";
export { ListingPage } from "./listing-page.ts";
export type { SearchRecord } from "./search-record.ts";
