import type { Document, SearchRecord } from "../models/index.ts";

export const searchIndexFileName = "search.json";

export const toSearchRecord = (doc: Document): SearchRecord => ({
  title: doc.metadata.title,
  url: doc.slug,
  summary: doc.metadata.summary,
});

export const buildSearchIndex = (ordered: readonly Document[]): SearchRecord[] => ordered.map(toSearchRecord);

export const serializeSearchIndex = (records: readonly SearchRecord[]): string => JSON.stringify(records);
