import { describe, expect, it } from "vitest";

import { paginate } from "../content/paginate.ts";
import { TemplateExecutionError, TemplateResolutionError } from "../errors.ts";
import { defaultSiteConfig } from "../models/index.ts";
import {
  DocumentValue, ListingValue, parseTemplate, scanSegments, TemplateEnvironment, tokenizeAction,
} from "../template/index.ts";
import type { Template, TemplateValue } from "../template/index.ts";
import { makeDocument } from "./fixtures.ts";

class MemoryEnvironment extends TemplateEnvironment {
  override readonly description = "memory";
  private readonly files: ReadonlyMap<string, string>;

  constructor(files: Record<string, string> = {}) {
    super();
    this.files = new Map(Object.entries(files));
  }

  override getTemplate(relPath: string): Template | undefined {
    const text = this.files.get(relPath);
    return text === undefined ? undefined : parseTemplate(text);
  }
}

const site = defaultSiteConfig().withOverrides({ baseURL: "https://example.test" });
const doc = makeDocument("post.md", "title: Tea & Cake\nsummary: Crumbs\ndate: 2024-01-02\nauthor: Robin\n\nHello", site);

const render = (source: string, root: TemplateValue = new DocumentValue(doc, site), env = new MemoryEnvironment()): string =>
  parseTemplate(source).render(root, site, env);

const listing = (count: number, capacity: number, index: number): ListingValue => {
  const docs = Array.from({ length: count }, (_, i) =>
    makeDocument(`d${i}.md`, `title: Doc ${i}\ndate: 2024-01-0${9 - i}\n\nx`, site),
  );
  const page = paginate(docs, capacity)[index];
  if (page === undefined) throw new Error(`no page ${index}`);
  return new ListingValue(page, site);
};

describe("template output", () => {
  it("escapes plain values and leaves rendered content alone", () => {
    expect(render("<h1>{{ .Title }}</h1>{{ .Content }}")).toBe("<h1>Tea &amp; Cake</h1><p>Hello</p>");
  });

  it("resolves field names without regard to case", () => {
    expect(render("{{ .title }}|{{ .SLUG }}|{{ .readTime }}")).toBe("Tea &amp; Cake|post.html|1");
  });

  it("exposes derived URLs and site fields", () => {
    expect(render("{{ .Permalink }} {{ .FullImageURL }} {{ .Site.Title }} {{ site.BaseURL }}")).toBe(
      "https://example.test/post.html https://example.test/images/default-cover.jpg Quire Site https://example.test",
    );
  });

  it("reads extra metadata through Params", () => {
    expect(render("{{ .Params.author }}")).toBe("Robin");
  });

  it("trims whitespace next to dashed delimiters", () => {
    expect(render("a  {{- .Slug -}}  b")).toBe("apost.htmlb");
  });

  it("drops comments", () => {
    expect(render("x{{/* note */}}y {{- /* trimmed */ -}} z")).toBe("xyz");
  });
});

describe("template control flow", () => {
  it("takes the matching else-if branch", () => {
    const source = "{{ if eq .ReadTime 2 }}two{{ else if eq .ReadTime 1 }}one{{ else }}many{{ end }}";
    expect(render(source)).toBe("one");
  });

  it("evaluates parenthesised pipelines", () => {
    expect(render("{{ if (eq .Title \"Tea & Cake\") }}yes{{ else }}no{{ end }}")).toBe("yes");
  });

  it("ranges with index and value variables", () => {
    const source = "{{ range $i, $d := .Documents }}{{ $i }}:{{ $d.Title }};{{ end }}";
    expect(render(source, listing(3, 6, 0))).toBe("0:Doc 0;1:Doc 1;2:Doc 2;");
  });

  it("renders the else body of an empty range", () => {
    expect(render("{{ range .Params.missing }}x{{ else }}none{{ end }}")).toBe("none");
  });

  it("rebinds dot inside with and falls back to else", () => {
    expect(render("{{ with .Params.author }}by {{ . }}{{ end }}")).toBe("by Robin");
    expect(render("{{ with .Params.editor }}by {{ . }}{{ else }}anon{{ end }}")).toBe("anon");
  });

  it("assigns to an outer variable from inside a range", () => {
    const source = "{{ $n := 0 }}{{ range .Documents }}{{ $n = add $n 1 }}{{ end }}{{ $n }}";
    expect(render(source, listing(4, 6, 0))).toBe("4");
  });

  it("reaches the root through $ inside a range", () => {
    expect(render("{{ range .Documents }}{{ $.PageNumber }}{{ end }}", listing(2, 6, 0))).toBe("11");
  });

  it("invokes a defined template with a new dot", () => {
    expect(render("{{ define \"wrap\" }}[{{ . }}]{{ end }}{{ template \"wrap\" .Slug }}")).toBe("[post.html]");
  });

  it("rejects a template that was never defined", () => {
    expect(() => render("{{ template \"missing\" . }}")).toThrow(TemplateResolutionError);
  });
});

describe("template functions", () => {
  it.each([
    ["{{ .Title | upper }}", "TEA &amp; CAKE"],
    ["{{ lower \"ABC\" }}", "abc"],
    ["{{ printf \"%s has %d min\" .Title .ReadTime }}", "Tea &amp; Cake has 1 min"],
    ["{{ default \"none\" .Params.missing }}", "none"],
    ["{{ default \"none\" .Params.author }}", "Robin"],
    ["{{ or .Params.missing \"fallback\" }}", "fallback"],
    ["{{ and .Title .Summary }}", "Crumbs"],
    ["{{ not .Params.missing }}", "true"],
    ["{{ len .Title }}", "10"],
    ["{{ sub 10 3 }}", "7"],
    ["{{ truncate 5 \"Hello world\" }}", "Hello…"],
    ["{{ urlize \"Hello World\" }}", "hello-world"],
    ["{{ absURL \"css/site.css\" }}", "https://example.test/css/site.css"],
    ["{{ relURL \"css/site.css\" }}", "/css/site.css"],
    ["{{ jsonify .Params | safeHTML }}", "{\"author\":\"Robin\"}"],
    ["{{ safeHTML \"<b>x</b>\" }}", "<b>x</b>"],
    ["{{ if ne .Slug \"other.html\" }}ne{{ end }}", "ne"],
    ["{{ if lt .Date \"2025\" }}older{{ end }}", "older"],
    ["{{ if eq .Slug \"a\" \"post.html\" }}any{{ end }}", "any"],
  ])("%s", (source, expected) => {
    expect(render(source)).toBe(expected);
  });

  it("includes partials with their own dot", () => {
    const env = new MemoryEnvironment({ "partials/meta.html": "<meta content=\"{{ .Title }}\">" });
    expect(render("{{ partial \"meta.html\" . }}", new DocumentValue(doc, site), env)).toBe(
      "<meta content=\"Tea &amp; Cake\">",
    );
  });

  it("fails on a missing partial", () => {
    expect(() => render("{{ partial \"nope.html\" . }}")).toThrow(TemplateResolutionError);
  });

  it("fails on an unknown function", () => {
    expect(() => render("{{ frobnicate .Title }}")).toThrow(TemplateExecutionError);
  });
});

describe("base templates", () => {
  const base = parseTemplate("<main>{{ block \"main\" . }}default{{ end }}</main>");

  it("fills a block from the page's define", () => {
    const page = parseTemplate("{{ define \"main\" }}{{ .Title }}{{ end }}");
    expect(base.render(new DocumentValue(doc, site), site, new MemoryEnvironment(), page.defines)).toBe(
      "<main>Tea &amp; Cake</main>",
    );
  });

  it("keeps the block body when the page defines nothing", () => {
    expect(base.render(new DocumentValue(doc, site), site, new MemoryEnvironment())).toBe("<main>default</main>");
  });
});

describe("listing fields", () => {
  it("exposes navigation for a middle page", () => {
    const source = "{{ .Title }} {{ .PageNumber }}/{{ .TotalPages }} {{ .PrevURL }} {{ .NextURL }} {{ .HasPrev }} {{ .IsLast }}";
    expect(render(source, listing(5, 2, 1))).toBe("Home 2/3 index.html page3.html true false");
  });
});

describe("template scanning", () => {
  it("splits text from actions and tokenizes quoted strings as one token", () => {
    const segments = scanSegments("a{{ printf \"%s|%s\" .X (lower .Y) }}b");
    expect(segments.map((s) => [s.isAction, s.text])).toEqual([
      [false, "a"],
      [true, "printf \"%s|%s\" .X (lower .Y)"],
      [false, "b"],
    ]);
    expect(tokenizeAction("$i, $v := .Documents | len")).toEqual(["$i", ",", "$v", ":=", ".Documents", "|", "len"]);
    expect(tokenizeAction("printf \"%s|%s\" .X (lower .Y)")).toEqual(["printf", "\"%s|%s\"", ".X", "(", "lower", ".Y", ")"]);
  });

  it("keeps an unterminated action as text", () => {
    expect(render("x {{ .Title")).toBe("x {{ .Title");
  });
});
