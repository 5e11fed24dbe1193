import { HtmlString } from "../utils/html.ts";
import { nil } from "./runtime-helpers.ts";
import {
  ArrayValue, BoolValue, DictValue, DocumentValue, HtmlValue, ListingValue, NumberValue, SiteValue, StringValue,
} from "./values.ts";
import type { TemplateValue } from "./values.ts";

const documentField = (v: DocumentValue, key: string): TemplateValue => {
  const doc = v.value;
  switch (key) {
    case "title":
      return new StringValue(doc.metadata.title);
    case "summary":
      return new StringValue(doc.metadata.summary);
    case "date":
      return new StringValue(doc.metadata.date);
    case "image":
      return new StringValue(doc.metadata.image);
    case "slug":
    case "url":
    case "relpermalink":
      return new StringValue(doc.slug);
    case "permalink":
    case "fullurl":
      return new StringValue(doc.fullUrl);
    case "fullimageurl":
      return new StringValue(doc.fullImageUrl);
    case "readtime":
      return new NumberValue(doc.readTime);
    case "content":
    case "body":
      return new HtmlValue(new HtmlString(doc.body));
    case "filename":
      return new StringValue(doc.filename);
    case "params":
      return DictValue.fromStrings(doc.metadata.extras);
    case "site":
      return new SiteValue(v.site);
    case "page":
    case "document":
      return v;
    default:
      return nil;
  }
};

const listingField = (v: ListingValue, key: string): TemplateValue => {
  const page = v.value;
  switch (key) {
    case "title":
      return new StringValue(v.site.listingTitle);
    case "documents":
    case "pages":
      return new ArrayValue(page.documents.map((doc) => new DocumentValue(doc, v.site)));
    case "pagenumber":
      return new NumberValue(page.pageNumber);
    case "totalpages":
      return new NumberValue(page.totalPages);
    case "prevurl":
      return new StringValue(page.prevUrl);
    case "nexturl":
      return new StringValue(page.nextUrl);
    case "hasprev":
      return new BoolValue(page.prevUrl !== "");
    case "hasnext":
      return new BoolValue(page.nextUrl !== "");
    case "isfirst":
      return new BoolValue(page.pageNumber === 1);
    case "islast":
      return new BoolValue(page.pageNumber === page.totalPages);
    case "filename":
    case "url":
      return new StringValue(page.fileName);
    case "site":
      return new SiteValue(v.site);
    case "page":
      return v;
    default:
      return nil;
  }
};

const siteField = (v: SiteValue, key: string): TemplateValue => {
  const site = v.value;
  switch (key) {
    case "title":
      return new StringValue(site.title);
    case "baseurl":
      return new StringValue(site.baseURL);
    case "domain":
      return site.domain !== undefined ? new StringValue(site.domain) : nil;
    case "languagecode":
      return new StringValue(site.languageCode);
    case "pagecapacity":
      return new NumberValue(site.pageCapacity);
    case "params":
      return DictValue.fromStrings(site.params);
    default:
      return nil;
  }
};

/** Field lookup for `.A.B.C` chains. Names match case-insensitively. */
export const resolvePath = (value: TemplateValue, segments: readonly string[]): TemplateValue => {
  let cur = value;
  for (const seg of segments) {
    if (seg === "") continue;
    const key = seg.toLowerCase();
    if (cur instanceof DocumentValue) cur = documentField(cur, key);
    else if (cur instanceof ListingValue) cur = listingField(cur, key);
    else if (cur instanceof SiteValue) cur = siteField(cur, key);
    else if (cur instanceof DictValue) cur = cur.get(seg) ?? nil;
    else return nil;
  }
  return cur;
};
