import { z } from "zod";

const relativeDir = z.string().trim().min(1);

export const siteConfigSchema = z
  .object({
    baseURL: z.string().default(""),
    title: z.string().default("Quire Site"),
    domain: z.string().trim().min(1).optional(),
    languageCode: z.string().default("en-us"),
    pageCapacity: z.number().int().min(1).default(6),
    listingTitle: z.string().default("Home"),
    contentDir: relativeDir.default("content"),
    outputDir: relativeDir.default("docs"),
    templateDir: relativeDir.default("templates"),
    imagesDir: relativeDir.default("images"),
    params: z.record(z.string(), z.coerce.string()).default({}),
  })
  .strict();

export type SiteConfigData = z.output<typeof siteConfigSchema>;
