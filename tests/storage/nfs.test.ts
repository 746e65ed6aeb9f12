import { mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { DEFAULT_MOUNT_OPTIONS, NfsStorage } from "../../src/storage/nfs";
import type { NfsStorageSettings } from "../../src/types";
import type { ProcessRunner } from "../../src/utils/process";

function runner(exitCodes: Record<string, number>, stderr = "") {
  return vi.fn<ProcessRunner>(async (command) => ({
    exitCode: exitCodes[command] ?? 0,
    stdout: "",
    stderr,
  }));
}

describe("NfsStorage", () => {
  let mountPoint: string;
  let settings: NfsStorageSettings;

  beforeEach(async () => {
    mountPoint = await mkdtemp(path.join(os.tmpdir(), "backhaul-nfs-"));
    settings = { server: "nas.internal", exportPath: "/exports/backups", mountPoint };
  });

  afterEach(async () => {
    await rm(mountPoint, { recursive: true, force: true });
  });

  test("skips mounting when the mount point is already mounted", async () => {
    const run = runner({ mountpoint: 0 });
    const storage = new NfsStorage(settings, { run });

    await storage.ensureMounted();
    await storage.ensureMounted();

    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith("mountpoint", ["-q", mountPoint]);
  });

  test("mounts the export with the default options", async () => {
    const run = runner({ mountpoint: 1, mount: 0 });
    const storage = new NfsStorage(settings, { run });

    await storage.ensureMounted();

    expect(run).toHaveBeenLastCalledWith("mount", [
      "-t",
      "nfs",
      "-o",
      DEFAULT_MOUNT_OPTIONS,
      "nas.internal:/exports/backups",
      mountPoint,
    ]);
  });

  test("reports a failed mount from testConnection", async () => {
    const run = runner({ mountpoint: 1, mount: 32 }, "access denied by server\n");
    const storage = new NfsStorage(settings, { run });

    expect(await storage.testConnection()).toEqual({
      ok: false,
      error: "Failed to mount nas.internal:/exports/backups: access denied by server",
    });
  });

  test("stores files under the mount and returns nfs URIs", async () => {
    const storage = new NfsStorage({ ...settings, basePath: "db" }, { run: runner({ mountpoint: 0 }) });
    const source = path.join(mountPoint, "source.dump");
    await writeFile(source, "dump-bytes");

    const uri = await storage.upload(source, "backups/orders/orders_20240115020000.dump");

    expect(uri).toBe("nfs://nas.internal/exports/backups/backups/orders/orders_20240115020000.dump");
    expect(storage.relativePath(uri)).toBe("backups/orders/orders_20240115020000.dump");
    expect(await storage.list("backups")).toEqual(["backups/orders/orders_20240115020000.dump"]);

    await storage.delete(uri);
    expect(await storage.list("backups")).toEqual([]);
  });
});
