import logger from "./logger";

/**
 * Delivers a non-critical notification (status message edit, dashboard
 * push). A failure is logged and reported as `false`; it never reaches the
 * caller's control flow.
 */
export async function notifyBestEffort(
  label: string,
  send: () => Promise<unknown>,
): Promise<boolean> {
  try {
    await send();
    return true;
  } catch (error) {
    const errorMessage =
      error instanceof Error ? error.message : "Unknown error";
    logger.debug(`Non-critical notification "${label}" failed: ${errorMessage}`);
    return false;
  }
}
