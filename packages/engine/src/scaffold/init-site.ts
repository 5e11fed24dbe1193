import { readdirSync } from "node:fs";
import { basename, join, resolve } from "node:path";
import { stringify } from "yaml";
import { ScaffoldError } from "../errors.ts";
import { dirExists, ensureDir, writeTextFile } from "../fs.ts";
import { humanizeSlug } from "../utils/text.ts";

const ensureEmptyDir = (path: string): void => {
  if (!dirExists(path)) {
    ensureDir(path);
    return;
  }
  if (readdirSync(path).length > 0) throw new ScaffoldError("Directory not empty", path);
};

const defaultConfigYaml = (title: string): string =>
  stringify({
    title,
    baseURL: "http://localhost:8000",
    languageCode: "en-us",
    pageCapacity: 6,
    listingTitle: "Home",
  });

const baseofHtml = (): string => `<!doctype html>
<html lang="{{ .Site.LanguageCode }}">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>{{ .Title }} | {{ .Site.Title }}</title>
    <link rel="stylesheet" href="{{ relURL "css/syntax.css" }}" />
    <link rel="alternate" type="application/rss+xml" href="{{ relURL "index.xml" }}" title="{{ .Site.Title }}" />
  </head>
  <body>
    {{ partial "header.html" . }}
    <main>
      {{ block "main" . }}{{ end }}
    </main>
  </body>
</html>
`;

const partialHeader = (): string => `<header>
  <h1><a href="{{ relURL "index.html" }}">{{ .Site.Title }}</a></h1>
</header>
`;

const singleHtml = (): string => `{{ define "main" }}
<article>
  <h2>{{ .Title }}</h2>
  <p class="muted">{{ .Date }} · {{ .ReadTime }} min read</p>
  <img src="{{ .FullImageURL }}" alt="{{ .Title }}" />
  <div class="content">
    {{ .Content }}
  </div>
</article>
{{ end }}
`;

const listHtml = (): string => `{{ define "main" }}
<section>
  <ul class="post-list">
    {{- range .Documents }}
    <li>
      <a href="{{ .URL }}">{{ .Title }}</a>
      <span class="muted">{{ .Date }}</span>
      <div class="summary">{{ .Summary }}</div>
    </li>
    {{- end }}
  </ul>
  <nav class="pagination">
    {{- if .HasPrev }}<a href="{{ .PrevURL }}">Newer</a>{{ end }}
    <span>Page {{ .PageNumber }} of {{ .TotalPages }}</span>
    {{- if .HasNext }}<a href="{{ .NextURL }}">Older</a>{{ end }}
  </nav>
</section>
{{ end }}
`;

const welcomeMd = (date: string): string => `---
title: Welcome
summary: The first document of a new site.
date: ${date}
---

This is your first document. Edit it under \`content/\` and run:

\`\`\`sh
quire build
\`\`\`
`;

/** ISO `YYYY-MM-DD` in UTC. */
export const isoDate = (now: Date): string => now.toISOString().substring(0, 10);

/** Creates a starter site in an empty or missing directory and returns its absolute path. */
export const initSite = (targetDir: string, now: Date = new Date()): string => {
  const dir = resolve(targetDir);
  ensureEmptyDir(dir);

  const title = humanizeSlug(basename(dir)) || "Quire Site";

  ensureDir(join(dir, "content", "images"));
  ensureDir(join(dir, "templates", "partials"));

  writeTextFile(join(dir, "quire.yaml"), defaultConfigYaml(title));
  writeTextFile(join(dir, "templates", "baseof.html"), baseofHtml());
  writeTextFile(join(dir, "templates", "single.html"), singleHtml());
  writeTextFile(join(dir, "templates", "list.html"), listHtml());
  writeTextFile(join(dir, "templates", "partials", "header.html"), partialHeader());
  writeTextFile(join(dir, "content", "welcome.md"), welcomeMd(isoDate(now)));
  return dir;
};
