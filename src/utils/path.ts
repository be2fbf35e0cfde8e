/**
 * Path validation utilities
 */

import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal attacks.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return normalizedPath.startsWith(normalizedDir + path.sep) || normalizedPath === normalizedDir;
}

/**
 * Express a path relative to a root using forward slashes, as stored in archives
 */
export function toArchivePath(filePath: string, root: string): string {
  return path.relative(root, path.resolve(root, filePath)).split(path.sep).join("/");
}
