import { mkdir, mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { retentionCutoff, runRetention, selectExpired } from "../../src/core/cleanup";
import { beginTaskRun, closeDatabase, finishTaskRun, getDeletionLogs, initDatabase } from "../../src/db";
import { LocalStorage } from "../../src/storage/local";
import type { StoredObject } from "../../src/types";
import { ordersTask } from "../helpers/fixtures";
import { MemoryStorage } from "../helpers/memory-storage";

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = new Date("2024-06-01T00:00:00Z");

function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY_MS);
}

describe("selectExpired", () => {
  const object = (path: string, modifiedAt: Date | null): StoredObject => ({ path, sizeBytes: 1, modifiedAt });

  test("cutoff is cleanupDays before now", () => {
    expect(retentionCutoff(30, NOW).toISOString()).toBe("2024-05-02T00:00:00.000Z");
  });

  test("expires only objects older than the window", () => {
    const { expired, kept } = selectExpired(
      [object("a", daysAgo(10)), object("b", daysAgo(40)), object("c", daysAgo(100))],
      new Map(),
      30,
      NOW,
    );
    expect(expired.map((c) => c.object.path)).toEqual(["b", "c"]);
    expect(kept.map((o) => o.path)).toEqual(["a"]);
  });

  test("recorded upload time wins over the listing time", () => {
    const { expired } = selectExpired([object("a", daysAgo(1))], new Map([["a", daysAgo(45)]]), 30, NOW);
    expect(expired).toEqual([{ object: object("a", daysAgo(1)), recordedAt: daysAgo(45) }]);
  });

  test("keeps objects without any known age", () => {
    const { expired, kept } = selectExpired([object("a", null)], new Map(), 1, NOW);
    expect(expired).toEqual([]);
    expect(kept).toHaveLength(1);
  });

  test("an object exactly at the cutoff is kept", () => {
    const { expired } = selectExpired([object("a", daysAgo(30))], new Map(), 30, NOW);
    expect(expired).toEqual([]);
  });
});

describe("runRetention", () => {
  let storage: MemoryStorage;

  beforeEach(async () => {
    await initDatabase(":memory:");
    storage = new MemoryStorage();
  });

  afterEach(() => {
    closeDatabase();
  });

  test("deletes exactly the artifacts older than cleanup_days", async () => {
    const task = ordersTask({ cleanup_days: 30 });
    storage.put("backups/orders/orders_10.dump", daysAgo(10));
    storage.put("backups/orders/orders_40.dump", daysAgo(40));
    storage.put("backups/orders/orders_100.dump", daysAgo(100));
    storage.put("backups/invoices/invoices_100.dump", daysAgo(100));

    const result = await runRetention(task, storage, { backupNamespace: "backups", storageConfigId: 7, now: NOW });

    expect(result).toEqual({
      checked: 3,
      kept: 1,
      deleted: ["backups/orders/orders_100.dump", "backups/orders/orders_40.dump"],
      failed: [],
    });
    expect([...storage.objects.keys()].sort()).toEqual([
      "backups/invoices/invoices_100.dump",
      "backups/orders/orders_10.dump",
    ]);

    const logs = getDeletionLogs();
    expect(logs).toHaveLength(2);
    expect(logs.every((l) => l.task_id === task.id && l.storage_config_id === 7 && l.success)).toBe(true);
    expect(logs.every((l) => l.reason === "retention_days")).toBe(true);
  });

  test("ages artifacts by the run that uploaded them", async () => {
    const task = ordersTask({ cleanup_days: 30 });
    storage.put("backups/orders/orders_20240401020000.dump", NOW);

    const historyId = beginTaskRun(task.id, daysAgo(61).toISOString());
    finishTaskRun(task.id, historyId, {
      status: "success",
      finishedAt: daysAgo(60).toISOString(),
      result: {
        artifactFilename: "orders_20240401020000.dump",
        artifactSizeMB: 1,
        storagePath: "object://test-bucket/backups/orders/orders_20240401020000.dump",
        durationSeconds: 3,
      },
    });

    const result = await runRetention(task, storage, { backupNamespace: "backups", storageConfigId: null, now: NOW });
    expect(result.deleted).toEqual(["backups/orders/orders_20240401020000.dump"]);
  });

  test("records failed deletions and carries on", async () => {
    const task = ordersTask({ cleanup_days: 30 });
    storage.put("backups/orders/a.dump", daysAgo(40));
    storage.put("backups/orders/b.dump", daysAgo(40));
    storage.failDeletes.add("backups/orders/a.dump");

    const result = await runRetention(task, storage, { backupNamespace: "backups", storageConfigId: null, now: NOW });

    expect(result.deleted).toEqual(["backups/orders/b.dump"]);
    expect(result.failed).toEqual([{ path: "backups/orders/a.dump", error: "permission denied" }]);

    const failedLog = getDeletionLogs().find((l) => !l.success);
    expect(failedLog?.storage_path).toBe("backups/orders/a.dump");
    expect(failedLog?.error_message).toBe("permission denied");
  });

  test("history rows from a previous storage root do not block cleanup", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "backhaul-retention-"));
    try {
      const local = new LocalStorage({ basePath: root });
      const task = ordersTask({ cleanup_days: 30 });

      const stale = path.join(root, "backups/orders/orders_20240101020000.dump");
      await mkdir(path.dirname(stale), { recursive: true });
      await writeFile(stale, "PGDMP-test");
      await utimes(stale, daysAgo(150), daysAgo(150));

      const historyId = beginTaskRun(task.id, daysAgo(61).toISOString());
      finishTaskRun(task.id, historyId, {
        status: "success",
        finishedAt: daysAgo(60).toISOString(),
        result: {
          artifactFilename: "orders_20231101020000.dump",
          artifactSizeMB: 1,
          storagePath: "local:///old/root/backups/orders/orders_20231101020000.dump",
          durationSeconds: 3,
        },
      });

      const result = await runRetention(task, local, { backupNamespace: "backups", storageConfigId: null, now: NOW });

      expect(result.deleted).toEqual(["backups/orders/orders_20240101020000.dump"]);
      expect(await local.list("backups/orders")).toEqual([]);
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });
});
