import { describe, expect, test } from "vitest";
import { bytesToGB, bytesToMB, formatDuration, roundTo } from "../../src/utils/format";

describe("format", () => {
  test("formatDuration picks the largest sensible unit", () => {
    expect(formatDuration(450)).toBe("450ms");
    expect(formatDuration(12_340)).toBe("12s");
    expect(formatDuration(125_000)).toBe("2m 5s");
    expect(formatDuration(3_780_000)).toBe("1h 3m");
  });

  test("byte conversions round to two decimals", () => {
    expect(bytesToGB(1.5 * 1024 ** 3)).toBe(1.5);
    expect(bytesToMB(3 * 1024 ** 2 + 1)).toBe(3);
    expect(roundTo(1.234567, 2)).toBe(1.23);
  });
});
