import fs from "node:fs";
import path from "node:path";

import { MissingResourceError } from "../errors";

export function isDirectory(dirPath: string): boolean {
  return fs.existsSync(dirPath) && fs.statSync(dirPath).isDirectory();
}

export function requireDirectory(dirPath: string, what: string): void {
  if (!isDirectory(dirPath)) {
    throw new MissingResourceError(dirPath, `${what} not found`);
  }
}

/** Files directly inside `dirPath` with the given extension, sorted by name. */
export function listFiles(dirPath: string, ext: string): string[] {
  return fs
    .readdirSync(dirPath, { withFileTypes: true })
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === ext)
    .map((entry) => path.join(dirPath, entry.name))
    .sort();
}

export function readText(filePath: string, what: string): string {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new MissingResourceError(filePath, `${what} could not be read`, { cause: err });
  }
}

export function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

export function writeText(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf-8");
}

/** File name without directory or extension: `img/cat.01.jpg` → `cat.01`. */
export function stem(fileName: string): string {
  return path.parse(fileName).name;
}
