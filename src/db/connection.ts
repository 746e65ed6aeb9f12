/**
 * Database connection management
 */

import { copyFile, mkdir, stat, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/logger";
import {
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
  initializeDatabase,
} from "./migrations";

const log = createLogger("db");

const IN_MEMORY = ":memory:";

let db: Database.Database | null = null;

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

async function removeQuietly(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (err) {
    log.debug(`Could not remove ${filePath}: ${errorMessage(err)}`);
  }
}

export async function initDatabase(dbPath: string): Promise<Database.Database> {
  if (db) {
    return db;
  }

  if (dbPath === IN_MEMORY) {
    db = new Database(IN_MEMORY);
    initializeDatabase(db);
    return db;
  }

  await mkdir(dirname(dbPath), { recursive: true });

  if (await exists(dbPath)) {
    // Open temporarily to check migration status
    const probe = new Database(dbPath);
    const currentVersion = getCurrentVersion(probe);
    const pending = getPendingMigrations(currentVersion);
    probe.close();

    if (pending.length > 0) {
      const backupPath = `${dbPath}.migration-backup`;
      log.info(`Pending migrations detected (${pending.length}), creating backup...`);
      await copyFile(dbPath, backupPath);

      try {
        db = new Database(dbPath);
        initializeDatabase(db);
        log.info(`Migrations completed successfully (v${currentVersion} -> v${getLatestVersion()})`);
        await removeQuietly(backupPath);
      } catch (err) {
        log.error(`Migration failed: ${errorMessage(err)}`);
        log.info("Rolling back database from backup...");

        if (db) {
          db.close();
          db = null;
        }

        await copyFile(backupPath, dbPath);
        await removeQuietly(backupPath);

        throw new Error(`Database migration failed and was rolled back: ${errorMessage(err)}`);
      }

      return db;
    }
  }

  db = new Database(dbPath);
  initializeDatabase(db);

  return db;
}

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDatabase() first.");
  }
  return db;
}

/**
 * Run `fn` inside a single transaction on the shared connection
 */
export function withTransaction<T>(fn: () => T): T {
  return getDatabase().transaction(fn)();
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
