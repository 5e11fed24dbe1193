const isWordSeparator = (ch: string): boolean =>
  ch === " " || ch === "-" || ch === "_" || ch === "." || ch === "/";

const isLetterOrDigit = (ch: string): boolean => /[\p{L}\p{N}]/u.test(ch);

export const slugify = (input: string): string => {
  const lower = input.trim().toLowerCase();
  let out = "";
  let wroteDash = false;

  for (const ch of lower) {
    if (isLetterOrDigit(ch)) {
      out += ch;
      wroteDash = false;
      continue;
    }
    if (isWordSeparator(ch) && out.length > 0 && !wroteDash) {
      out += "-";
      wroteDash = true;
    }
  }

  while (out.endsWith("-")) out = out.substring(0, out.length - 1);
  return out;
};

export const humanizeSlug = (slug: string): string => {
  const parts = slug.replace(/[_.]/g, "-").split("-");
  const words: string[] = [];
  for (const partRaw of parts) {
    const part = partRaw.trim();
    if (part === "") continue;
    words.push(part.substring(0, 1).toUpperCase() + part.substring(1));
  }
  return words.join(" ");
};

export const trimTrailingSlashes = (url: string): string => {
  let out = url.trim();
  while (out.endsWith("/")) out = out.substring(0, out.length - 1);
  return out;
};

/** Drops `extension` from the end of `fileName` when present (case-sensitive). */
export const stripExtension = (fileName: string, extension: string): string =>
  fileName.endsWith(extension) ? fileName.substring(0, fileName.length - extension.length) : fileName;

export const replaceExtension = (fileName: string, extension: string, replacement: string): string =>
  stripExtension(fileName, extension) + replacement;
