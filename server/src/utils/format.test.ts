import { describe, expect, it } from "vitest";
import { formatMegabytes, progressBar } from "./format";

describe("formatMegabytes", () => {
  it("formats with one decimal", () => {
    expect(formatMegabytes(0)).toBe("0.0");
    expect(formatMegabytes(1572864)).toBe("1.5");
    expect(formatMegabytes(25 * 1024 * 1024)).toBe("25.0");
  });
});

describe("progressBar", () => {
  it("fills one segment per full 10%", () => {
    expect(progressBar(0)).toBe("░░░░░░░░░░");
    expect(progressBar(45)).toBe("████░░░░░░");
    expect(progressBar(100)).toBe("██████████");
  });

  it("clamps out of range values", () => {
    expect(progressBar(-5)).toBe("░░░░░░░░░░");
    expect(progressBar(150)).toBe("██████████");
  });
});
