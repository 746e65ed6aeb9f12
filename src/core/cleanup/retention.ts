/**
 * Retention policy logic
 */

import type { StoredObject } from "../../types";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RetentionCandidate {
  object: StoredObject;
  /** Time the artifact is considered to have been written */
  recordedAt: Date;
}

export interface RetentionSelection {
  expired: RetentionCandidate[];
  kept: StoredObject[];
}

export function retentionCutoff(cleanupDays: number, now: Date): Date {
  return new Date(now.getTime() - cleanupDays * DAY_MS);
}

/**
 * Split listed objects into expired and kept.
 *
 * An object's age comes from `uploadedAt` (keyed by relative path) when the
 * run that wrote it is known, else from the listing's modification time.
 * Objects with neither are kept.
 */
export function selectExpired(
  objects: StoredObject[],
  uploadedAt: ReadonlyMap<string, Date>,
  cleanupDays: number,
  now: Date,
): RetentionSelection {
  const cutoff = retentionCutoff(cleanupDays, now);
  const selection: RetentionSelection = { expired: [], kept: [] };

  for (const object of objects) {
    const recordedAt = uploadedAt.get(object.path) ?? object.modifiedAt;
    if (recordedAt && recordedAt.getTime() < cutoff.getTime()) {
      selection.expired.push({ object, recordedAt });
    } else {
      selection.kept.push(object);
    }
  }

  return selection;
}
