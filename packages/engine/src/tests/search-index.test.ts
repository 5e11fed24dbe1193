import { describe, expect, it } from "vitest";

import { orderByDateDescending } from "../content/order.ts";
import { buildSearchIndex, serializeSearchIndex } from "../content/search-index.ts";
import { makeDocument } from "./fixtures.ts";

describe("buildSearchIndex", () => {
  it("projects each document to title, url and summary in collection order", () => {
    const ordered = orderByDateDescending([
      makeDocument("old.md", "title: Old\nsummary: First\ndate: 2020-01-01\n\nx"),
      makeDocument("new.md", "title: New\ndate: 2022-01-01\n\nx"),
    ]);
    expect(buildSearchIndex(ordered)).toEqual([
      { title: "New", url: "new.html", summary: "No summary provided." },
      { title: "Old", url: "old.html", summary: "First" },
    ]);
  });

  it("serializes to a single JSON array", () => {
    const records = [{ title: "A \"quoted\" title", url: "a.html", summary: "S" }];
    expect(serializeSearchIndex(records)).toBe("[{\"title\":\"A \\\"quoted\\\" title\",\"url\":\"a.html\",\"summary\":\"S\"}]");
  });

  it("serializes an empty collection as an empty array", () => {
    expect(serializeSearchIndex(buildSearchIndex([]))).toBe("[]");
  });
});
