import { markdownPipeline } from "./pipeline.ts";
import type { MarkdownPipeline } from "./pipeline.ts";

export const normalizeNewlines = (text: string): string => text.replace(/\r\n?/g, "\n");

export const renderMarkdown = (markdownRaw: string, pipeline: MarkdownPipeline = markdownPipeline): string => {
  const markdown = normalizeNewlines(markdownRaw);
  if (markdown.trim() === "") return "";
  return String(pipeline.processSync(markdown)).trim();
};
