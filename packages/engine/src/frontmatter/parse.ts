import { DocumentMetadata } from "../models/index.ts";
import { ParsedContent } from "./parsed-content.ts";

const beginLine = /^-{3}(\s.*)?$/;
const endLine = /^(-{3}|\.{3})(\s.*)?$/;
const declarationLine = /^ {0,3}([A-Za-z0-9_-]+):\s*(.*)$/;
const continuationLine = /^ {4,}(.*)$/;

const recognizedKeys = new Set(["title", "summary", "date", "image"]);

/**
 * Collects `key: value` declarations from the leading block. Each key keeps
 * every value it was given, in order; callers read the first.
 */
const collectDeclarations = (lines: string[]): { values: Map<string, string[]>; consumed: number } => {
  const values = new Map<string, string[]>();
  let i = 0;
  let currentKey: string | undefined = undefined;

  if (lines.length > 0 && beginLine.test(lines[0] ?? "")) i++;

  for (; i < lines.length; i++) {
    const line = lines[i] ?? "";
    if (line.trim() === "") {
      i++;
      break;
    }
    if (endLine.test(line)) {
      i++;
      break;
    }

    const declared = declarationLine.exec(line);
    if (declared !== null) {
      const key = (declared[1] ?? "").toLowerCase();
      const value = (declared[2] ?? "").trim();
      const existing = values.get(key);
      if (existing !== undefined) existing.push(value);
      else values.set(key, [value]);
      currentKey = key;
      continue;
    }

    const continued = continuationLine.exec(line);
    if (continued !== null && currentKey !== undefined) {
      values.get(currentKey)?.push((continued[1] ?? "").trim());
      continue;
    }

    break;
  }

  return { values, consumed: i };
};

const toMetadata = (values: Map<string, string[]>): DocumentMetadata => {
  const first = (key: string): string | undefined => values.get(key)?.[0];
  const extras = new Map<string, string>();
  for (const [key, list] of values) {
    if (recognizedKeys.has(key)) continue;
    extras.set(key, list[0] ?? "");
  }
  return new DocumentMetadata(first("title"), first("summary"), first("date"), first("image"), extras);
};

export const splitLines = (text: string): string[] => text.replace(/\r\n?/g, "\n").split("\n");

/**
 * Splits a document into its optional leading metadata block and the body.
 * A document without declarations yields empty metadata and its full text.
 */
export const parseContent = (text: string): ParsedContent => {
  const lines = splitLines(text);
  const { values, consumed } = collectDeclarations(lines);
  if (values.size === 0 && consumed === 0) return new ParsedContent(DocumentMetadata.empty(), lines.join("\n"));
  return new ParsedContent(toMetadata(values), lines.slice(consumed).join("\n"));
};
