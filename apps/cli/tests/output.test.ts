import { describe, expect, it } from "vitest";
import { createFormatter, formatRelativeTime, formatSize } from "../src/lib/output.ts";

describe("formatSize", () => {
  it("formats byte counts", () => {
    expect(formatSize(0)).toBe("0 B");
    expect(formatSize(512)).toBe("512 B");
    expect(formatSize(1536)).toBe("1.50 KB");
    expect(formatSize(5 * 1024 * 1024)).toBe("5.00 MB");
  });
});

describe("formatRelativeTime", () => {
  const now = Date.parse("2024-06-15T12:00:00.000Z");

  it("formats recent times relative to now", () => {
    expect(formatRelativeTime("2024-06-15T11:59:30.000Z", now)).toBe("just now");
    expect(formatRelativeTime("2024-06-15T11:55:00.000Z", now)).toBe("5m ago");
    expect(formatRelativeTime("2024-06-15T09:00:00.000Z", now)).toBe("3h ago");
    expect(formatRelativeTime("2024-06-13T12:00:00.000Z", now)).toBe("2d ago");
  });

  it("falls back to the date for old times", () => {
    expect(formatRelativeTime("2024-01-02T00:00:00.000Z", now)).toBe("2024-01-02");
  });
});

describe("createFormatter", () => {
  it("falls back to text for unknown formats", () => {
    expect(createFormatter({ format: "xml" }).format).toBe("text");
    expect(createFormatter({ format: "json" }).format).toBe("json");
  });
});
