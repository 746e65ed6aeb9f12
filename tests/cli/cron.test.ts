import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { cronCommand } from "../../src/cli/commands/cron";

describe("cron command", () => {
  let printed: string[];

  beforeEach(() => {
    printed = [];
    vi.spyOn(console, "log").mockImplementation((value: unknown) => {
      printed.push(String(value));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("to prints the expression for a schedule", async () => {
    expect(await cronCommand(["to", "daily", "--hour", "2", "--minute", "30"])).toBe(0);
    expect(printed).toEqual(["30 2 * * *"]);
  });

  test("to weekly takes the day", async () => {
    expect(await cronCommand(["to", "weekly", "--hour", "3", "--day", "0"])).toBe(0);
    expect(printed).toEqual(["0 3 * * 0"]);
  });

  test("to rejects out-of-range values", async () => {
    expect(await cronCommand(["to", "daily", "--hour", "25"])).toBe(1);
    expect(printed).toEqual([]);
  });

  test("to rejects unknown kinds", async () => {
    expect(await cronCommand(["to", "monthly"])).toBe(1);
  });

  test("from describes a supported expression", async () => {
    expect(await cronCommand(["from", "15 * * * *"])).toBe(0);

    const output: unknown = JSON.parse(printed.join("\n"));
    expect(output).toMatchObject({
      expression: "15 * * * *",
      intent: { kind: "hourly", minute: 15 },
      description: "Every hour at minute 15",
    });
  });

  test("from exits non-zero for expressions outside the simple kinds", async () => {
    expect(await cronCommand(["from", "*/5 * * * *"])).toBe(1);

    const output: unknown = JSON.parse(printed.join("\n"));
    expect(output).toMatchObject({ intent: null, description: "cron: */5 * * * *" });
  });
});
