import { parseContent } from "../frontmatter/parse.ts";
import { markdownPipeline, renderMarkdown } from "../markdown/index.ts";
import type { MarkdownPipeline } from "../markdown/index.ts";
import { TransformedDocument } from "../models/index.ts";
import { countWords, estimateReadTime } from "./read-time.ts";

/**
 * Turns one document's raw text into rendered HTML plus its declared
 * metadata. Holds no state between calls: the metadata parser is a pure
 * function and the Markdown pipeline is frozen.
 */
export class DocumentTransformer {
  private readonly pipeline: MarkdownPipeline;

  constructor(pipeline: MarkdownPipeline = markdownPipeline) {
    this.pipeline = pipeline;
  }

  transform(rawText: string): TransformedDocument {
    const parsed = parseContent(rawText);
    const wordCount = countWords(rawText);
    return new TransformedDocument(
      renderMarkdown(parsed.body, this.pipeline),
      parsed.metadata,
      wordCount,
      estimateReadTime(wordCount),
    );
  }
}
