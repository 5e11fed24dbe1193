import rehypeHighlight from "rehype-highlight";
import rehypeStringify from "rehype-stringify";
import remarkGfm from "remark-gfm";
import remarkParse from "remark-parse";
import remarkRehype from "remark-rehype";
import { unified } from "unified";

const createPipeline = () =>
  unified()
    .use(remarkParse)
    .use(remarkGfm)
    .use(remarkRehype, { allowDangerousHtml: true })
    .use(rehypeHighlight)
    .use(rehypeStringify, { allowDangerousHtml: true })
    .freeze();

export type MarkdownPipeline = ReturnType<typeof createPipeline>;

/** Frozen processors carry no per-document state, so one instance is shared by every render. */
export const markdownPipeline: MarkdownPipeline = createPipeline();
