import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { loadSiteConfig, parseSiteConfig } from "../config/loader.ts";
import { ConfigError } from "../errors.ts";
import { writeTextFile } from "../fs.ts";
import { createTempDir, deleteIfExists } from "./fixtures.ts";

describe("parseSiteConfig", () => {
  it("applies defaults for keys that are not set", () => {
    const config = parseSiteConfig("title: My Notes\n", "quire.yaml");
    expect(config.title).toBe("My Notes");
    expect(config.baseURL).toBe("");
    expect(config.pageCapacity).toBe(6);
    expect(config.contentDir).toBe("content");
    expect(config.outputDir).toBe("docs");
    expect(config.templateDir).toBe("templates");
    expect(config.domain).toBeUndefined();
  });

  it("strips trailing slashes from baseURL", () => {
    expect(parseSiteConfig("baseURL: https://example.test/site//\n", "quire.yaml").baseURL).toBe("https://example.test/site");
  });

  it("coerces params to strings", () => {
    const config = parseSiteConfig("params:\n  year: 2024\n  author: Kim\n", "quire.yaml");
    expect([...config.params.entries()]).toEqual([
      ["year", "2024"],
      ["author", "Kim"],
    ]);
  });

  it("reads JSON through the same parser", () => {
    const config = parseSiteConfig("{\"pageCapacity\": 3, \"domain\": \"notes.example.test\"}", "quire.json");
    expect(config.pageCapacity).toBe(3);
    expect(config.domain).toBe("notes.example.test");
  });

  it("treats an empty file as all defaults", () => {
    expect(parseSiteConfig("", "quire.yaml").title).toBe("Quire Site");
  });

  it.each([
    ["pageCapacity: 0\n", "pageCapacity"],
    ["pageCapacity: 2.5\n", "pageCapacity"],
    ["theme: dark\n", "theme"],
    ["title: [unclosed\n", "quire.yaml"],
  ])("rejects %j", (text, fragment) => {
    expect(() => parseSiteConfig(text, "quire.yaml")).toThrow(ConfigError);
    expect(() => parseSiteConfig(text, "quire.yaml")).toThrow(fragment);
  });
});

describe("loadSiteConfig", () => {
  let siteDir = "";

  afterEach(() => {
    deleteIfExists(siteDir);
  });

  it("returns defaults when no configuration file exists", () => {
    siteDir = createTempDir("config");
    const loaded = loadSiteConfig(siteDir);
    expect(loaded.path).toBeUndefined();
    expect(loaded.config.title).toBe("Quire Site");
  });

  it("prefers quire.yaml over quire.json", () => {
    siteDir = createTempDir("config");
    writeTextFile(join(siteDir, "quire.json"), "{\"title\": \"From JSON\"}");
    writeTextFile(join(siteDir, "quire.yaml"), "title: From YAML\n");
    const loaded = loadSiteConfig(siteDir);
    expect(loaded.path).toBe(join(siteDir, "quire.yaml"));
    expect(loaded.config.title).toBe("From YAML");
  });
});
