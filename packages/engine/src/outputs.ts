import { toAbsoluteUrl } from "./content/normalizer.ts";
import type { Document, SiteConfig } from "./models/index.ts";
import { escapeHtml } from "./utils/html.ts";

export const sitemapFileName = "sitemap.xml";
export const feedFileName = "index.xml";
export const robotsFileName = "robots.txt";

const escapeXml = (value: string): string => escapeHtml(value);

const wrapCdata = (raw: string): string => "<![CDATA[" + raw.replaceAll("]]>", "]]]]><![CDATA[>") + "]]>";

/** RFC 1123 date, or undefined when the document's date string does not parse. */
export const toPubDate = (date: string): string | undefined => {
  const parsed = Date.parse(date);
  return Number.isNaN(parsed) ? undefined : new Date(parsed).toUTCString();
};

export const renderRss = (config: SiteConfig, docs: readonly Document[], now: Date): string => {
  const lines: string[] = [
    "<?xml version=\"1.0\" encoding=\"utf-8\"?>",
    "<rss version=\"2.0\" xmlns:content=\"http://purl.org/rss/1.0/modules/content/\">",
    "<channel>",
    `<title>${escapeXml(config.title)}</title>`,
    `<link>${escapeXml(toAbsoluteUrl(config.baseURL, ""))}</link>`,
    `<description>${escapeXml(config.title)}</description>`,
    `<language>${escapeXml(config.languageCode)}</language>`,
    `<lastBuildDate>${now.toUTCString()}</lastBuildDate>`,
    "<generator>quire</generator>",
  ];

  for (const doc of docs) {
    const link = escapeXml(doc.fullUrl);
    lines.push("<item>");
    lines.push(`<title>${escapeXml(doc.metadata.title)}</title>`);
    lines.push(`<link>${link}</link>`);
    lines.push(`<guid isPermaLink="true">${link}</guid>`);
    const pub = toPubDate(doc.metadata.date);
    if (pub !== undefined) lines.push(`<pubDate>${pub}</pubDate>`);
    lines.push(`<description>${wrapCdata(doc.metadata.summary)}</description>`);
    lines.push(`<content:encoded>${wrapCdata(doc.body)}</content:encoded>`);
    lines.push("</item>");
  }

  lines.push("</channel>", "</rss>");
  return lines.join("\n") + "\n";
};

export const renderSitemap = (config: SiteConfig, paths: readonly string[], now: Date): string => {
  const lastmod = now.toISOString();
  const lines = [
    "<?xml version=\"1.0\" encoding=\"utf-8\"?>",
    "<urlset xmlns=\"http://www.sitemaps.org/schemas/sitemap/0.9\">",
  ];
  for (const path of paths) {
    lines.push(`<url><loc>${escapeXml(toAbsoluteUrl(config.baseURL, path))}</loc><lastmod>${lastmod}</lastmod></url>`);
  }
  lines.push("</urlset>");
  return lines.join("\n") + "\n";
};

export const renderRobotsTxt = (config: SiteConfig): string =>
  `User-agent: *\nAllow: /\nSitemap: ${toAbsoluteUrl(config.baseURL, sitemapFileName)}\n`;
