import { describe, expect, it } from "vitest";
import { isPlainFilename, sanitizeFilename } from "./sanitizer";

describe("sanitizeFilename", () => {
  it("keeps ordinary names", () => {
    expect(sanitizeFilename("holiday photo.jpg", "x")).toBe("holiday photo.jpg");
  });

  it("drops directory components", () => {
    expect(sanitizeFilename("../../etc/passwd", "x")).toBe("passwd");
    expect(sanitizeFilename("C:\\Users\\me\\a.txt", "x")).toBe("a.txt");
  });

  it("removes reserved and control characters", () => {
    expect(sanitizeFilename('a<b>:c"|?*\u0007.txt', "x")).toBe("abc.txt");
  });

  it("does not produce hidden files", () => {
    expect(sanitizeFilename(".env", "x")).toBe("env");
  });

  it("truncates long names but keeps the extension", () => {
    const result = sanitizeFilename(`${"a".repeat(300)}.tar.gz`, "x");

    expect(result).toHaveLength(200);
    expect(result.endsWith("a.gz")).toBe(true);
  });

  it("uses the fallback when nothing is left", () => {
    expect(sanitizeFilename(undefined, "fallback")).toBe("fallback");
    expect(sanitizeFilename("", "fallback")).toBe("fallback");
    expect(sanitizeFilename("dir/", "fallback")).toBe("fallback");
    expect(sanitizeFilename("...", "fallback")).toBe("fallback");
  });
});

describe("isPlainFilename", () => {
  it.each([
    ["a.txt", true],
    [".hidden", true],
    ["", false],
    [".", false],
    ["..", false],
    ["../a", false],
    ["a/b", false],
    ["a\\b", false],
    ["a\u0000b", false],
  ])("%j is %s", (name, expected) => {
    expect(isPlainFilename(name)).toBe(expected);
  });
});
