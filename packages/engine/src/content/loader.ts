import { join } from "node:path";
import { MissingContentRootError } from "../errors.ts";
import { dirExists, listFiles, readTextFile } from "../fs.ts";

export const contentExtension = ".md";

export class SourceDocument {
  readonly filename: string;
  readonly rawText: string;

  constructor(filename: string, rawText: string) {
    this.filename = filename;
    this.rawText = rawText;
  }
}

export const isContentFile = (name: string): boolean => name.endsWith(contentExtension);

/**
 * Reads every content document directly inside `contentDir` as UTF-8.
 * Sub-directories (images and the like) are not descended into. Filenames
 * come back in code-unit order so runs over the same tree see the same input.
 */
export const loadDocuments = (contentDir: string): SourceDocument[] => {
  if (!dirExists(contentDir)) throw new MissingContentRootError(contentDir);

  const names = listFiles(contentDir).filter(isContentFile).sort();
  const docs: SourceDocument[] = [];
  for (const name of names) {
    docs.push(new SourceDocument(name, readTextFile(join(contentDir, name))));
  }
  return docs;
};
