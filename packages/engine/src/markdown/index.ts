export { markdownPipeline } from "./pipeline.ts";
export type { MarkdownPipeline } from "./pipeline.ts";
export { renderMarkdown, normalizeNewlines } from "./render-basic.ts";
