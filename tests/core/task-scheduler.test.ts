import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { DatabaseDumpExecutor } from "../../src/core/backup/dump-executor";
import { type TaskDumper, TaskScheduler } from "../../src/core/scheduler/task-scheduler";
import {
  closeDatabase,
  getDatabase,
  getDatabaseTaskById,
  getHistoryForTask,
  initDatabase,
} from "../../src/db";
import type { NormalizedStorageConfig } from "../../src/storage/settings";
import type { DumpResult } from "../../src/types";
import { ConfigurationError } from "../../src/utils/errors";
import type { ProcessRunner } from "../../src/utils/process";
import { localStorageConfig, ordersTask, testCipher } from "../helpers/fixtures";
import { MemoryStorage } from "../helpers/memory-storage";

const MEMORY_TARGET: NormalizedStorageConfig = {
  id: null,
  name: "memory",
  storage_type: "object",
  config_data: {},
};

const DUMP_RESULT: DumpResult = {
  artifactFilename: "orders_20240115020000.dump",
  artifactSizeMB: 0.01,
  storagePath: "object://test-bucket/backups/orders/orders_20240115020000.dump",
  durationSeconds: 1,
};

function fakeDumper(result: DumpResult = DUMP_RESULT) {
  return { dump: vi.fn<TaskDumper["dump"]>(async () => result) };
}

describe("TaskScheduler", () => {
  beforeEach(async () => {
    await initDatabase(":memory:");
  });

  afterEach(() => {
    vi.useRealTimers();
    closeDatabase();
  });

  describe("runTaskNow with the dump tool", () => {
    let root: string;
    let tempDir: string;

    beforeEach(async () => {
      root = await mkdtemp(path.join(os.tmpdir(), "backhaul-sched-store-"));
      tempDir = await mkdtemp(path.join(os.tmpdir(), "backhaul-sched-tmp-"));
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
      await rm(tempDir, { recursive: true, force: true });
    });

    function scheduler(run: ProcessRunner): TaskScheduler {
      const executor = new DatabaseDumpExecutor({
        tools: { dump: "pg_dump", restore: "pg_restore", sql: "psql" },
        tempDir,
        backupNamespace: "backups",
        cipher: testCipher,
        run,
      });
      return new TaskScheduler({ executor, backupNamespace: "backups", resyncIntervalSeconds: 60 });
    }

    test("a successful run uploads the dump and records history", async () => {
      const storage = localStorageConfig(root);
      const task = ordersTask({ storage_config_id: storage.id });
      const run = vi.fn<ProcessRunner>(async (_command, args) => {
        const output = args.find((arg) => arg.startsWith("--file="));
        if (output) await writeFile(output.slice("--file=".length), "PGDMP-test");
        return { exitCode: 0, stdout: "", stderr: "" };
      });

      const outcome = await scheduler(run).runTaskNow(task.id);

      expect(outcome?.status).toBe("success");
      expect(outcome?.result?.artifactFilename).toMatch(/^orders_\d{14}\.dump$/);
      expect(outcome?.result?.storagePath).toContain(`${root}/backups/orders/orders_`);

      const [history] = getHistoryForTask(task.id);
      expect(history?.status).toBe("success");
      expect(history?.artifact_filename).toBe(outcome?.result?.artifactFilename);
      expect(history?.storage_path).toBe(outcome?.result?.storagePath);
      expect(getDatabaseTaskById(task.id)?.last_status).toBe("success");
    });

    test("a failing dump records an error row and uploads nothing", async () => {
      const storage = localStorageConfig(root);
      const task = ordersTask({ storage_config_id: storage.id });
      const run = vi.fn<ProcessRunner>(async () => ({ exitCode: 1, stdout: "", stderr: "authentication failed" }));

      const outcome = await scheduler(run).runTaskNow(task.id);

      expect(outcome).toMatchObject({ status: "error", error: "pg_dump exited with code 1: authentication failed" });
      const history = getHistoryForTask(task.id);
      expect(history).toHaveLength(1);
      expect(history[0]?.status).toBe("error");
      expect(history[0]?.error_message).toBe("pg_dump exited with code 1: authentication failed");
      expect(history[0]?.storage_path).toBeNull();

      const updated = getDatabaseTaskById(task.id);
      expect(updated?.last_status).toBe("error");
      expect(updated?.last_error).toBe("pg_dump exited with code 1: authentication failed");
    });

    test("a failed upload records an error row without a storage path", async () => {
      const task = ordersTask();
      const memory = new MemoryStorage();
      memory.failUploads = "bucket unavailable";
      const executor = new DatabaseDumpExecutor({
        tools: { dump: "pg_dump", restore: "pg_restore", sql: "psql" },
        tempDir,
        backupNamespace: "backups",
        cipher: testCipher,
        run: vi.fn<ProcessRunner>(async (_command, args) => {
          const output = args.find((arg) => arg.startsWith("--file="));
          if (output) await writeFile(output.slice("--file=".length), "PGDMP-test");
          return { exitCode: 0, stdout: "", stderr: "" };
        }),
      });
      const scheduler = new TaskScheduler({
        executor,
        backupNamespace: "backups",
        resyncIntervalSeconds: 60,
        resolveStorage: () => MEMORY_TARGET,
        createBackend: () => memory,
      });

      const outcome = await scheduler.runTaskNow(task.id);

      expect(outcome?.status).toBe("error");
      expect(outcome?.error).toMatch(/^Upload of orders_\d{14}\.dump failed: bucket unavailable$/);
      expect(memory.uploadAttempts).toHaveLength(1);
      expect(await readdir(tempDir)).toEqual([]);

      const history = getHistoryForTask(task.id);
      expect(history).toHaveLength(1);
      expect(history[0]?.status).toBe("error");
      expect(history[0]?.error_message).toBe(outcome?.error);
      expect(history[0]?.storage_path).toBeNull();
      expect(getDatabaseTaskById(task.id)?.last_status).toBe("error");
    });

    test("a task without storage fails the run", async () => {
      const task = ordersTask();
      const run = vi.fn<ProcessRunner>();

      const outcome = await scheduler(run).runTaskNow(task.id);

      expect(outcome?.error).toBe(`Task ${task.id} has no storage configured`);
      expect(run).not.toHaveBeenCalled();
    });
  });

  test("unknown tasks are rejected", async () => {
    const scheduler = new TaskScheduler({ executor: fakeDumper(), backupNamespace: "backups", resyncIntervalSeconds: 60 });
    await expect(scheduler.runTaskNow(99)).rejects.toBeInstanceOf(ConfigurationError);
  });

  test("a second run of a task still in progress is skipped", async () => {
    const task = ordersTask();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const executor = {
      dump: vi.fn<TaskDumper["dump"]>(async () => {
        await gate;
        return DUMP_RESULT;
      }),
    };
    const scheduler = new TaskScheduler({
      executor,
      backupNamespace: "backups",
      resyncIntervalSeconds: 60,
      resolveStorage: () => MEMORY_TARGET,
      createBackend: () => new MemoryStorage(),
    });

    const first = scheduler.runTaskNow(task.id);
    const second = await scheduler.runTaskNow(task.id);
    release();

    expect(second).toBeNull();
    expect((await first)?.status).toBe("success");
    expect(executor.dump).toHaveBeenCalledTimes(1);
  });

  test("applies retention after a successful run when cleanup is enabled", async () => {
    const storage = new MemoryStorage();
    storage.put("backups/orders/orders_20230101020000.dump", new Date("2023-01-01T02:00:00Z"));
    const enabled = ordersTask({ cleanup_days: 30 });
    const disabled = ordersTask({ name: "No cleanup", cleanup_enabled: false });
    const scheduler = new TaskScheduler({
      executor: fakeDumper(),
      backupNamespace: "backups",
      resyncIntervalSeconds: 60,
      resolveStorage: () => MEMORY_TARGET,
      createBackend: () => storage,
    });

    expect((await scheduler.runTaskNow(disabled.id))?.retention).toBeNull();
    const outcome = await scheduler.runTaskNow(enabled.id);

    expect(outcome?.retention?.deleted).toEqual(["backups/orders/orders_20230101020000.dump"]);
  });

  test("no retention after a failed run", async () => {
    const storage = new MemoryStorage();
    storage.put("backups/orders/orders_20230101020000.dump", new Date("2023-01-01T02:00:00Z"));
    const task = ordersTask();
    const executor = { dump: vi.fn<TaskDumper["dump"]>(async () => Promise.reject(new Error("disk full"))) };
    const scheduler = new TaskScheduler({
      executor,
      backupNamespace: "backups",
      resyncIntervalSeconds: 60,
      resolveStorage: () => MEMORY_TARGET,
      createBackend: () => storage,
    });

    const outcome = await scheduler.runTaskNow(task.id);

    expect(outcome?.status).toBe("error");
    expect(storage.deleted).toEqual([]);
  });

  describe("resync", () => {
    function newScheduler(executor: TaskDumper = fakeDumper()): TaskScheduler {
      return new TaskScheduler({
        executor,
        backupNamespace: "backups",
        resyncIntervalSeconds: 60,
        resolveStorage: () => MEMORY_TARGET,
        createBackend: () => new MemoryStorage(),
      });
    }

    test("keeps one job per active scheduled task", () => {
      vi.useFakeTimers({ now: new Date("2024-01-15T01:30:00Z") });
      const a = ordersTask();
      const b = ordersTask({ name: "Paused", schedule_enabled: false });
      const c = ordersTask({ name: "Inactive", is_active: false });
      const d = ordersTask({ name: "Broken", schedule_cron: "not a cron" });
      const e = ordersTask({ name: "Minutely", schedule_cron: "* * * * *" });

      const scheduler = newScheduler();
      scheduler.resync();

      expect(scheduler.getStatus().map((s) => s.jobId)).toEqual([`db-task-${a.id}`, `db-task-${e.id}`]);
      for (const skipped of [b, c, d]) {
        expect(scheduler.hasJob(`db-task-${skipped.id}`)).toBe(false);
      }
      expect(getDatabaseTaskById(e.id)?.next_run).toBe("2024-01-15T01:31:00.000Z");

      scheduler.stop();
    });

    test("drops jobs for tasks that were deactivated", () => {
      vi.useFakeTimers({ now: new Date("2024-01-15T01:30:00Z") });
      const task = ordersTask();
      const scheduler = newScheduler();
      scheduler.resync();
      expect(scheduler.hasJob(`db-task-${task.id}`)).toBe(true);

      getDatabase().prepare("UPDATE database_backup_tasks SET is_active = 0 WHERE id = ?").run(task.id);
      scheduler.resync();

      expect(scheduler.getStatus()).toEqual([]);
      scheduler.stop();
    });

    test("fires at the next occurrence and re-arms", async () => {
      vi.useFakeTimers({ now: new Date("2024-01-15T01:59:30Z") });
      const task = ordersTask({ schedule_cron: "* * * * *" });
      const executor = fakeDumper();
      const scheduler = newScheduler(executor);
      scheduler.resync();

      await vi.advanceTimersByTimeAsync(29_000);
      expect(executor.dump).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1_000);
      expect(executor.dump).toHaveBeenCalledTimes(1);
      expect(executor.dump.mock.calls[0]?.[0].id).toBe(task.id);
      expect(scheduler.getStatus()[0]?.nextRun.toISOString()).toBe("2024-01-15T02:01:00.000Z");

      scheduler.stop();
    });

    test("waits out delays longer than a single timer allows", async () => {
      vi.useFakeTimers({ now: new Date("2024-01-15T00:00:00Z") });
      ordersTask({ schedule_cron: "0 0 1 1 *" });
      const executor = fakeDumper();
      const scheduler = newScheduler(executor);
      scheduler.resync();

      const [job] = scheduler.getStatus();
      const delay = (job?.nextRun.getTime() ?? 0) - Date.now();
      expect(delay).toBeGreaterThan(2 ** 31 - 1);

      await vi.advanceTimersByTimeAsync(2 ** 31 - 1);
      expect(executor.dump).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(delay - (2 ** 31 - 1));
      expect(executor.dump).toHaveBeenCalledTimes(1);

      scheduler.stop();
    });
  });
});
