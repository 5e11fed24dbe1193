import { describe, expect, it } from "vitest";

import { countPages, listingFileName, paginate } from "../content/paginate.ts";
import type { Document } from "../models/index.ts";
import { datedDocument } from "./fixtures.ts";

const collection = (n: number): Document[] =>
  Array.from({ length: n }, (_, i) => datedDocument(`doc-${String(i).padStart(2, "0")}.md`, "2024-01-01"));

describe("paginate", () => {
  it("splits 13 documents at capacity 6 into pages of 6, 6 and 1", () => {
    const pages = paginate(collection(13), 6);
    expect(pages.map((p) => p.documents.length)).toEqual([6, 6, 1]);
    expect(pages.map((p) => p.totalPages)).toEqual([3, 3, 3]);
    expect(pages.map((p) => p.fileName)).toEqual(["index.html", "page2.html", "page3.html"]);
  });

  it("links neighbours and leaves the ends empty", () => {
    const [first, second, third] = paginate(collection(13), 6);
    expect(first?.prevUrl).toBe("");
    expect(first?.nextUrl).toBe("page2.html");
    expect(second?.prevUrl).toBe("index.html");
    expect(second?.nextUrl).toBe("page3.html");
    expect(third?.prevUrl).toBe("page2.html");
    expect(third?.nextUrl).toBe("");
  });

  it("reconstructs the ordered collection when pages are concatenated", () => {
    const docs = collection(11);
    const pages = paginate(docs, 4);
    expect(pages.flatMap((p) => p.documents)).toEqual(docs);
  });

  it("produces a single page with no links when everything fits", () => {
    const pages = paginate(collection(6), 6);
    expect(pages).toHaveLength(1);
    expect(pages[0]?.prevUrl).toBe("");
    expect(pages[0]?.nextUrl).toBe("");
  });

  it("returns no pages for an empty collection", () => {
    expect(paginate([], 6)).toEqual([]);
  });

  it("rejects a capacity below one", () => {
    expect(() => paginate(collection(2), 0)).toThrow(RangeError);
    expect(() => paginate(collection(2), 2.5)).toThrow(RangeError);
  });
});

describe("listing names", () => {
  it("names page one canonically and numbers the rest", () => {
    expect(listingFileName(1)).toBe("index.html");
    expect(listingFileName(12)).toBe("page12.html");
  });

  it("counts pages by ceiling division", () => {
    expect(countPages(7, 6)).toBe(2);
    expect(countPages(12, 6)).toBe(2);
    expect(countPages(0, 6)).toBe(0);
  });
});
