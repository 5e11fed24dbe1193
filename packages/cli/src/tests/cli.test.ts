import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockInstance } from "vitest";

import { silentLogger } from "@quire/engine";

import { main, VERSION } from "../cli-main.ts";

describe("quire cli", () => {
  let root = "";
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const printed = (spy: MockInstance<typeof console.log>): string[] => spy.mock.calls.map((call) => String(call[0]));

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "quire-cli-"));
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  it("prints the version", () => {
    expect(main(["version"], root)).toBe(0);
    expect(printed(logSpy)).toEqual([VERSION]);
  });

  it("prints usage for help", () => {
    expect(main(["--help"], root)).toBe(0);
    expect(printed(logSpy)[0]).toBe("quire - static pages and a search index from a folder of Markdown");
  });

  it("exits with 2 on an unknown command", () => {
    expect(main(["deploy"], root)).toBe(2);
    expect(printed(errorSpy)[0]).toContain("Unknown command: deploy");
  });

  it("exits with 2 when new is missing its argument", () => {
    expect(main(["new"], root)).toBe(2);
    expect(main(["new", "site"], root)).toBe(2);
  });

  it("scaffolds a site, adds a document and builds it", () => {
    const site = join(root, "site");
    const out = join(root, "out");

    expect(main(["new", "site", site], root)).toBe(0);
    expect(main(["new", "second-post.md", "-s", site], root)).toBe(0);
    expect(existsSync(join(site, "content", "second-post.md"))).toBe(true);

    expect(main(["build", "--source", site, "-d", out, "--baseURL", "https://example.test"], root, silentLogger)).toBe(0);
    expect(existsSync(join(out, "index.html"))).toBe(true);
    expect(existsSync(join(out, "second-post.html"))).toBe(true);
    expect(printed(logSpy)).toContain(`Built → ${out} (6 pages)`);
  });

  it("resolves relative paths against the working directory", () => {
    expect(main(["new", "site", "site"], root)).toBe(0);
    expect(main(["new", "later.md", "-s", "site"], root)).toBe(0);
    expect(main(["build", "-s", "site", "-d", "out"], root, silentLogger)).toBe(0);

    expect(existsSync(join(root, "site", "content", "later.md"))).toBe(true);
    expect(existsSync(join(root, "out", "later.html"))).toBe(true);
    expect(printed(logSpy)).toContain(`Built → ${join(root, "out")} (6 pages)`);
  });

  it("treats options without a command as a build", () => {
    mkdirSync(join(root, "content"), { recursive: true });
    expect(main(["--no-clean"], root, silentLogger)).toBe(0);
    expect(printed(logSpy)).toEqual([`Nothing to build → ${join(root, "docs")}`]);
  });

  it("reports fatal build errors and exits with 1", () => {
    mkdirSync(join(root, "content"), { recursive: true });
    writeFileSync(join(root, "content", "a.md"), "title: A\n\nbody");

    expect(main(["build"], root, silentLogger)).toBe(1);
    expect(printed(errorSpy)[0]).toContain("TemplateResolutionError: Template \"single.html\" not found");
  });

  it("exits with 1 when scaffolding into a non-empty directory", () => {
    writeFileSync(join(root, "keep.txt"), "x");
    expect(main(["new", "site", root], root)).toBe(1);
    expect(printed(errorSpy)[0]).toContain("ScaffoldError: Directory not empty");
  });
});
