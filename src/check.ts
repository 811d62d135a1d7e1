import { CheckError, errorMessage, toError } from "./errors.js";
import type { Check, Issue } from "./types.js";

/**
 * Runs a check under a deadline. The check's signal is aborted when the deadline passes,
 * and any failure (including the timeout) surfaces as a CheckError naming the check.
 */
export async function runCheck(check: Check, timeoutMs: number): Promise<Issue[]> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the timeout wins over the check's own abort error.
      reject(new CheckError(check.name, `${check.name} check timed out after ${Math.round(timeoutMs / 1000)}s`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([check.run(controller.signal), deadline]);
  } catch (err) {
    if (err instanceof CheckError) throw err;
    throw new CheckError(check.name, `${check.name} check failed: ${errorMessage(err)}`, toError(err));
  } finally {
    clearTimeout(timer);
  }
}
