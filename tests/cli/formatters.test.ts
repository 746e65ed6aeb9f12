import { stripVTControlCharacters } from "node:util";
import { describe, expect, test } from "vitest";
import { parseId } from "../../src/cli/runtime";
import { colorStatus, formatSummary, formatTableRow, formatTableSeparator } from "../../src/cli/ui";

const plain = (value: string) => stripVTControlCharacters(value);

describe("formatters", () => {
  test("formatSummary aligns labels and skips empty values", () => {
    const summary = formatSummary([
      { label: "Files", value: 120 },
      { label: "Size", value: null },
      { label: "Stored at", value: "s3://agent-backups/uploads.tar.gz" },
    ]);

    expect(plain(summary)).toBe(["Files      120", "Stored at  s3://agent-backups/uploads.tar.gz"].join("\n"));
  });

  test("formatTableRow pads each column", () => {
    expect(plain(formatTableRow(["1", "ok"], [3, 4]))).toBe("1   │ ok  ");
  });

  test("formatTableSeparator", () => {
    expect(plain(formatTableSeparator([2, 3]))).toBe("───┼────");
  });

  test("colorStatus labels a missing status", () => {
    expect(plain(colorStatus("success"))).toBe("success");
    expect(plain(colorStatus(null))).toBe("never");
  });
});

describe("parseId", () => {
  test("accepts positive integers", () => {
    expect(parseId("42", "Task id")).toBe(42);
  });

  test("rejects anything else", () => {
    expect(() => parseId(undefined, "Task id")).toThrow("Task id must be a positive integer, got: (missing)");
    expect(() => parseId("0", "Task id")).toThrow("Task id must be a positive integer, got: 0");
    expect(() => parseId("3a", "Task id")).toThrow(Error);
    expect(() => parseId("-1", "Task id")).toThrow(Error);
  });
});
