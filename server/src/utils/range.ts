export interface ByteRange {
  start: number;
  end: number;
}

/**
 * Parses a single `Range: bytes=...` header against a file of `size` bytes.
 * Returns `undefined` when there is no header, `"unsatisfiable"` when the
 * range is malformed or starts past the end. The end offset is clamped to
 * the last byte.
 */
export function parseByteRange(
  header: string | undefined,
  size: number,
): ByteRange | "unsatisfiable" | undefined {
  if (header === undefined) return undefined;

  const match = /^bytes=(\d*)-(\d*)$/.exec(header.trim());
  if (!match) return "unsatisfiable";

  const [, startText, endText] = match;

  if (startText === "") {
    // suffix range: the last N bytes
    if (endText === "") return "unsatisfiable";
    const length = parseInt(endText, 10);
    if (length === 0 || size === 0) return "unsatisfiable";
    return { start: Math.max(0, size - length), end: size - 1 };
  }

  const start = parseInt(startText, 10);
  const end = endText === "" ? size - 1 : parseInt(endText, 10);

  if (start >= size || end < start) return "unsatisfiable";

  return { start, end: Math.min(end, size - 1) };
}
