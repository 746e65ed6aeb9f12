import { describe, expect, test } from "vitest";
import { SftpStorage } from "../../src/storage/sftp";

describe("SftpStorage", () => {
  const storage = new SftpStorage({
    host: "files.internal",
    username: "backup",
    password: "test-secret",
    basePath: "/srv/backups/",
  });

  test("relativePath strips scheme, host and base path", () => {
    expect(storage.relativePath("sftp://files.internal/srv/backups/backups/orders/orders_20240115020000.dump")).toBe(
      "backups/orders/orders_20240115020000.dump",
    );
  });

  test("relativePath accepts absolute remote paths and relative keys", () => {
    expect(storage.relativePath("/srv/backups/backups/orders/x.dump")).toBe("backups/orders/x.dump");
    expect(storage.relativePath("backups/orders/x.dump")).toBe("backups/orders/x.dump");
  });

  test("a base path that only shares a prefix is not stripped", () => {
    expect(storage.relativePath("/srv/backups-old/x.dump")).toBe("srv/backups-old/x.dump");
  });
});
