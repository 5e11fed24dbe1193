import { copyFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { OutputPreparationError } from "./errors.ts";
import { copyDirRecursive, deleteDirRecursive, ensureDir, writeTextFile } from "./fs.ts";

export const cssDirName = "css";
export const imagesDirName = "images";
export const domainMarkerFileName = "CNAME";
export const syntaxStylesheetName = "syntax.css";

const syntaxStylesheetSource = fileURLToPath(new URL("../assets/syntax.css", import.meta.url));

/** Removes the output root when `clean`, then recreates it with its fixed sub-directories. */
export const prepareOutputDir = (outputDir: string, clean: boolean): void => {
  try {
    if (clean) deleteDirRecursive(outputDir);
    ensureDir(join(outputDir, cssDirName));
    ensureDir(join(outputDir, imagesDirName));
  } catch (err) {
    throw new OutputPreparationError(outputDir, err);
  }
};

/** Mirrors the images directory into `<output>/images`. Returns the number of files copied. */
export const copyImages = (srcDir: string, outputDir: string): number =>
  copyDirRecursive(srcDir, join(outputDir, imagesDirName));

export const writeDomainMarker = (outputDir: string, domain: string): void => {
  writeTextFile(join(outputDir, domainMarkerFileName), domain);
};

export const writeSyntaxStylesheet = (outputDir: string): void => {
  const dest = join(outputDir, cssDirName, syntaxStylesheetName);
  ensureDir(join(outputDir, cssDirName));
  copyFileSync(syntaxStylesheetSource, dest);
};
