/**
 * Retry utility with exponential backoff.
 *
 * Used for transient failures against the registry (manifest requests).
 */

import { log } from "../logger.js";

const RETRYABLE_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "ENOTFOUND", "UND_ERR_CONNECT_TIMEOUT"]);

function errorCode(err: unknown): string {
  if (err instanceof Error) {
    if ("code" in err && typeof err.code === "string") {
      return err.code;
    }
    // fetch() wraps socket errors: TypeError("fetch failed", { cause })
    if (err.cause !== undefined) {
      return errorCode(err.cause);
    }
  }
  return "";
}

/**
 * True for network-level failures and 5xx responses.
 */
export function isRetryableError(err: unknown): boolean {
  const message = err instanceof Error ? err.message : String(err);
  return RETRYABLE_CODES.has(errorCode(err))
    || message.includes("fetch failed")
    || message.includes("timed out")
    || /\b5\d{2}\b/.test(message);
}

/**
 * Retry an async function with exponential backoff.
 *
 * @param fn - Async function to retry.
 * @param maxRetries - Maximum number of retry attempts (0 = no retries, just run once).
 * @param initialDelayMs - Initial delay in milliseconds (doubles each attempt).
 * @param label - Operation label for debug logging.
 * @returns The result of fn() on success.
 * @throws The last error if all attempts fail or the error is not retryable.
 */
export async function retryAsync<T>(
  fn: () => Promise<T>,
  maxRetries = 3,
  initialDelayMs = 1000,
  label = "Operation"
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (!isRetryableError(err) || attempt >= maxRetries) {
        throw err;
      }
      const delay = Math.min(initialDelayMs * (2 ** attempt), 30000);
      log.debug(`${label} failed (attempt ${attempt + 1}/${maxRetries + 1}), retrying in ${delay}ms`);
      await new Promise((r) => setTimeout(r, delay));
    }
  }
}
