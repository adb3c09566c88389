/**
 * Reduces a platform-supplied filename to something safe to place in the
 * flat download directory.
 * Rules:
 * - Basename only (no path traversal)
 * - Control characters and characters reserved on common filesystems removed
 * - Leading dots stripped, so nothing becomes a hidden file
 * - Max 200 characters, extension kept when truncating
 * - Fallback when nothing usable remains
 */
export function sanitizeFilename(
  name: string | undefined | null,
  fallback: string,
): string {
  if (!name) return fallback;

  const parts = name.split(/[\\/]/);
  const base = parts.pop() || "";

  let s = base.replace(/[\u0000-\u001f\u007f<>:"|?*]/g, "").trim();
  s = s.replace(/^\.+/, "");

  if (s.length > 200) {
    const dot = s.lastIndexOf(".");
    const ext = dot > 0 && s.length - dot <= 16 ? s.slice(dot) : "";
    s = s.slice(0, 200 - ext.length) + ext;
  }

  if (!s) return fallback;

  return s;
}

/** True when `name` can only refer to an entry directly inside the root. */
export function isPlainFilename(name: string): boolean {
  return (
    name.length > 0 &&
    name !== "." &&
    name !== ".." &&
    !/[\\/\u0000]/.test(name)
  );
}
