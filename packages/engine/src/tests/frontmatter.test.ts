import { describe, expect, it } from "vitest";

import { parseContent } from "../frontmatter/parse.ts";

describe("parseContent", () => {
  it("reads recognised keys and keeps the body after the blank line", () => {
    const parsed = parseContent("title: Hello\nDate: 2024-03-01\nsummary: Short\n\n# Body\n");
    expect(parsed.metadata.title).toBe("Hello");
    expect(parsed.metadata.date).toBe("2024-03-01");
    expect(parsed.metadata.summary).toBe("Short");
    expect(parsed.metadata.image).toBeUndefined();
    expect(parsed.body).toBe("# Body\n");
  });

  it("accepts a fenced block and drops both fences", () => {
    const parsed = parseContent("---\ntitle: Fenced\n---\nText");
    expect(parsed.metadata.title).toBe("Fenced");
    expect(parsed.body).toBe("Text");
  });

  it("also closes the block on a dotted line", () => {
    const parsed = parseContent("---\ntitle: X\n...\nbody");
    expect(parsed.metadata.title).toBe("X");
    expect(parsed.body).toBe("body");
  });

  it("returns empty metadata and the full text when nothing is declared", () => {
    const parsed = parseContent("Just a paragraph.\n\nAnother one.");
    expect(parsed.metadata.title).toBeUndefined();
    expect(parsed.metadata.extras.size).toBe(0);
    expect(parsed.body).toBe("Just a paragraph.\n\nAnother one.");
  });

  it("passes unknown keys through as extras, lower-cased", () => {
    const parsed = parseContent("Author: Sam\ntags: a\n\nbody");
    expect([...parsed.metadata.extras.entries()]).toEqual([
      ["author", "Sam"],
      ["tags", "a"],
    ]);
  });

  it("keeps only the first value of a repeated or continued key", () => {
    const parsed = parseContent("title: First\n    second line\ntitle: Again\n\nbody");
    expect(parsed.metadata.title).toBe("First");
  });

  it("stops at the first line that is not a declaration and leaves it in the body", () => {
    const parsed = parseContent("title: T\nnot a declaration\nmore");
    expect(parsed.metadata.title).toBe("T");
    expect(parsed.body).toBe("not a declaration\nmore");
  });

  it("normalises CRLF line endings", () => {
    const parsed = parseContent("title: Windows\r\n\r\nline");
    expect(parsed.metadata.title).toBe("Windows");
    expect(parsed.body).toBe("line");
  });
});
