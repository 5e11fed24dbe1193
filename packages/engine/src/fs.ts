import { copyFileSync, existsSync, mkdirSync, readdirSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { dirname, join, relative } from "node:path";

export const dirExists = (path: string): boolean => existsSync(path) && statSync(path).isDirectory();

export const fileExists = (path: string): boolean => existsSync(path) && statSync(path).isFile();

export const ensureDir = (path: string): void => {
  mkdirSync(path, { recursive: true });
};

export const readTextFile = (path: string): string => readFileSync(path, "utf-8");

export const writeTextFile = (path: string, content: string): void => {
  const dir = dirname(path);
  if (dir !== "") ensureDir(dir);
  writeFileSync(path, content, "utf-8");
};

export const deleteDirRecursive = (path: string): void => {
  if (!existsSync(path)) return;
  rmSync(path, { recursive: true, force: true });
};

export const listFiles = (dir: string): string[] => {
  if (!dirExists(dir)) return [];
  const names: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (entry.isFile()) names.push(entry.name);
  }
  return names;
};

const listFilesRecursive = (rootDir: string, dir: string, out: string[]): void => {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) listFilesRecursive(rootDir, full, out);
    else if (entry.isFile()) out.push(relative(rootDir, full));
  }
};

export const copyDirRecursive = (srcDir: string, destDir: string): number => {
  if (!dirExists(srcDir)) return 0;
  ensureDir(destDir);

  const files: string[] = [];
  listFilesRecursive(srcDir, srcDir, files);
  for (const rel of files) {
    const destFile = join(destDir, rel);
    ensureDir(dirname(destFile));
    copyFileSync(join(srcDir, rel), destFile);
  }
  return files.length;
};
