import { MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { AgentClient } from "../../src/core/agents/client";
import type { AgentTaskConfig } from "../../src/core/agents/schemas";

const ORIGIN = "http://10.0.0.5:11540";

const TASK_CONFIG: AgentTaskConfig = {
  task_id: 3,
  source_path: "/srv/uploads",
  create_archive: true,
  archive_format: "tar.gz",
  s3_endpoint: "minio.internal:9000",
  s3_access_key: "test-access",
  s3_secret_key: "test-secret",
  s3_bucket: "agent-backups",
  s3_region: "us-east-1",
  cleanup_enabled: true,
  cleanup_days: 14,
  is_docker_compose: false,
  docker_compose_path: null,
  schedule_cron: "0 3 * * *",
};

describe("AgentClient", () => {
  let mockAgent: MockAgent;
  let client: AgentClient;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    client = new AgentClient("10.0.0.5", 11540, { dispatcher: mockAgent, timeoutMs: 1000 });
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  test("builds the base URL from address and port", () => {
    expect(client.baseUrl).toBe(ORIGIN);
    expect(new AgentClient("10.0.0.6").baseUrl).toBe("http://10.0.0.6:11540");
  });

  test("ping is true only for HTTP 200", async () => {
    const pool = mockAgent.get(ORIGIN);
    pool.intercept({ path: "/ping", method: "GET" }).reply(200, "pong");
    pool.intercept({ path: "/ping", method: "GET" }).reply(503, "busy");

    expect(await client.ping()).toBe(true);
    expect(await client.ping()).toBe(false);
  });

  test("ping is false when the agent cannot be reached", async () => {
    mockAgent.get(ORIGIN).intercept({ path: "/ping", method: "GET" }).replyWithError(new Error("connect ECONNREFUSED"));

    expect(await client.ping()).toBe(false);
  });

  test("reads system telemetry", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/api/system", method: "GET" })
      .reply(200, { disk_free_gb: 120.5, disk_total_gb: 500, memory_free_mb: 2048, cpu_load_percent: 12 });

    expect(await client.getSystemInfo()).toEqual({
      disk_free_gb: 120.5,
      disk_total_gb: 500,
      memory_free_mb: 2048,
      cpu_load_percent: 12,
    });
  });

  test("telemetry with the wrong shape is null", async () => {
    mockAgent.get(ORIGIN).intercept({ path: "/api/system", method: "GET" }).reply(200, { disk_free_gb: "lots" });

    expect(await client.getSystemInfo()).toBeNull();
  });

  test("posts the path for filesystem info", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/api/filesystem", method: "POST", body: JSON.stringify({ path: "/srv/uploads" }) })
      .reply(200, { filesystem: "/dev/sda1", mount_point: "/srv", available_gb: 80, total_gb: 200 });

    expect(await client.getFilesystemInfo("/srv/uploads")).toEqual({
      filesystem: "/dev/sda1",
      mount_point: "/srv",
      available_gb: 80,
      total_gb: 200,
    });
  });

  test("sendTaskConfig posts the task and reports acceptance", async () => {
    const pool = mockAgent.get(ORIGIN);
    pool.intercept({ path: "/api/task/config", method: "POST", body: JSON.stringify(TASK_CONFIG) }).reply(200, {});
    pool.intercept({ path: "/api/task/config", method: "POST" }).reply(400, { error: "bad cron" });

    expect(await client.sendTaskConfig(TASK_CONFIG)).toBe(true);
    expect(await client.sendTaskConfig(TASK_CONFIG)).toBe(false);
  });

  test("executeTask returns the agent's result", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/api/task/execute", method: "POST" })
      .reply(200, { success: true, archive_size: 42.5, files_count: 120, s3_path: "s3://agent-backups/uploads.tar.gz" });

    expect(await client.executeTask(TASK_CONFIG)).toEqual({
      success: true,
      archive_size: 42.5,
      files_count: 120,
      s3_path: "s3://agent-backups/uploads.tar.gz",
    });
  });

  test("executeTask turns HTTP and transport failures into results", async () => {
    const pool = mockAgent.get(ORIGIN);
    pool.intercept({ path: "/api/task/execute", method: "POST" }).reply(500, "oops");
    pool.intercept({ path: "/api/task/execute", method: "POST" }).replyWithError(new Error("socket hang up"));

    expect(await client.executeTask(TASK_CONFIG)).toEqual({ success: false, error: "HTTP 500" });
    const failed = await client.executeTask(TASK_CONFIG);
    expect(failed.success).toBe(false);
    expect(failed.error).toContain("POST http://10.0.0.5:11540/api/task/execute failed");
  });

  test("getBackups drops malformed entries", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/api/backups", method: "GET" })
      .reply(200, {
        backups: [
          { source_path: "/srv/uploads", backup_date: "2024-01-15T03:00:00Z", status: "success" },
          { source_path: "/srv/media", status: "finished" },
          { status: "error" },
        ],
      });

    expect(await client.getBackups()).toEqual([
      { source_path: "/srv/uploads", backup_date: "2024-01-15T03:00:00Z", status: "success" },
    ]);
  });

  test("getBackups is null when the list cannot be fetched", async () => {
    mockAgent.get(ORIGIN).intercept({ path: "/api/backups", method: "GET" }).reply(502, "bad gateway");

    expect(await client.getBackups()).toBeNull();
  });

  test("a missing backups field is an empty list", async () => {
    mockAgent.get(ORIGIN).intercept({ path: "/api/backups", method: "GET" }).reply(200, {});

    expect(await client.getBackups()).toEqual([]);
  });
});
