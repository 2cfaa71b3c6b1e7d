import * as fs from "node:fs";
import * as path from "node:path";
import { CliError, NotFoundError } from "./errors.js";

/**
 * Check whether a path exists
 */
export function exists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Read a text file, throwing NotFoundError if it is missing
 */
export function readText(filePath: string, what = "File"): string {
  if (!exists(filePath)) {
    throw new NotFoundError(filePath, what);
  }
  if (!fs.statSync(filePath).isFile()) {
    throw new CliError(`${what} ${filePath} is not a regular file`);
  }
  return fs.readFileSync(filePath, "utf-8");
}

/**
 * Ensure directory exists
 */
export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Write text to a file, creating parent directories and replacing any existing content
 */
export function writeText(filePath: string, content: string): void {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, content);
}

/**
 * Resolve a user-supplied path against a root (cwd by default)
 */
export function resolvePath(filePath: string, root: string = process.cwd()): string {
  return path.isAbsolute(filePath) ? filePath : path.join(root, filePath);
}

/**
 * Format bytes for display
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}
