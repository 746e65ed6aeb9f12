import { describe, expect, test } from "vitest";
import { ExternalToolError } from "../../src/utils/errors";
import { runProcess } from "../../src/utils/process";

describe("runProcess", () => {
  test("captures output and the exit code", async () => {
    const result = await runProcess(process.execPath, [
      "-e",
      "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)",
    ]);

    expect(result).toEqual({ exitCode: 3, stdout: "out", stderr: "err" });
  });

  test("passes the given environment", async () => {
    const result = await runProcess(process.execPath, ["-e", "process.stdout.write(process.env.PGPASSWORD ?? '')"], {
      env: { ...process.env, PGPASSWORD: "test-secret" },
    });

    expect(result.stdout).toBe("test-secret");
  });

  test("rejects when the command cannot be started", async () => {
    await expect(runProcess("backhaul-missing-tool", [])).rejects.toBeInstanceOf(ExternalToolError);
  });
});
