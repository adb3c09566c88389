const MIB = 1024 * 1024;

export function formatMegabytes(bytes: number): string {
  return (bytes / MIB).toFixed(1);
}

/** Ten-segment bar, one segment per full 10%. */
export function progressBar(percent: number): string {
  const filled = Math.min(10, Math.max(0, Math.floor(percent / 10)));
  return "█".repeat(filled) + "░".repeat(10 - filled);
}
