/**
 * Artifact naming utilities
 */

import type { DumpFormat } from "../types";

const FORMAT_EXTENSIONS: Record<DumpFormat, string> = {
  custom: "dump",
  plain: "sql",
  tar: "tar",
};

export function extensionForFormat(format: DumpFormat): string {
  return FORMAT_EXTENSIONS[format];
}

/**
 * Replace path separators so a database name is safe as a file and folder name
 */
export function sanitizeName(name: string): string {
  return name.replace(/[/\\]/g, "_");
}

/**
 * UTC timestamp as 14 digits (YYYYMMDDHHmmss)
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace(/[-T:]/g, "");
}

export function generateArtifactName(
  databaseName: string,
  format: DumpFormat,
  now: Date = new Date(),
): string {
  return `${sanitizeName(databaseName)}_${formatTimestamp(now)}.${extensionForFormat(format)}`;
}

/**
 * Remote folder holding every artifact of one database
 */
export function artifactPrefix(namespace: string, databaseName: string): string {
  const root = namespace.replace(/\/+$/, "");
  const folder = sanitizeName(databaseName);
  return root ? `${root}/${folder}` : folder;
}

export function artifactRemotePath(
  namespace: string,
  databaseName: string,
  filename: string,
): string {
  return `${artifactPrefix(namespace, databaseName)}/${filename}`;
}

export function jobIdForTask(taskId: number): string {
  return `db-task-${taskId}`;
}
