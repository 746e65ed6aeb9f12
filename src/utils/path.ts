/**
 * Path validation and manipulation utilities
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

export function stripLeadingSlash(value: string): string {
  return value.replace(/^\/+/, "");
}

/**
 * Remove `prefix` from the start of `value` when present
 */
export function stripPrefix(value: string, prefix: string): string {
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}

/**
 * Whether `key` lies under the folder `prefix`, matching whole segments
 */
export function isKeyWithinPrefix(key: string, prefix: string | undefined): boolean {
  if (!prefix) return true;
  const normalizedPrefix = prefix.endsWith("/") ? prefix : `${prefix}/`;
  return key.startsWith(normalizedPrefix);
}
