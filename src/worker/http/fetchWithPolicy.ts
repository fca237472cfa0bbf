import { waitForRateLimit } from "./rateLimit";

const USER_AGENT = "listing-commute-finder/1.0 (+batch worker)";

const DEFAULT_TIMEOUT_MS = 12000;
const MAX_RETRIES = 3;
const BASE_BACKOFF_MS = 500;

export interface FetchPolicyOptions {
  /** Request timeout in ms (default 12000) */
  timeoutMs?: number;
  /** Max retries (default 3) */
  maxRetries?: number;
  /** Skip per-host pacing */
  skipRateLimit?: boolean;
  /** Extra headers to merge in */
  headers?: Record<string, string>;
}

export interface PolicyFetchResult {
  httpStatus: number;
  content: string;
  finalUrl: string;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Fetch a URL with:
 * - Configurable timeout (default 12s)
 * - Retries (default 3) with exponential backoff + jitter, on network
 *   errors and on 429/5xx responses
 * - Consistent User-Agent header
 * - Per-host pacing (unless skipRateLimit)
 *
 * Returns { httpStatus, content, finalUrl } of the last response.
 */
export async function fetchWithPolicy(
  url: string,
  opts: FetchPolicyOptions = {}
): Promise<PolicyFetchResult> {
  const {
    timeoutMs = DEFAULT_TIMEOUT_MS,
    maxRetries = MAX_RETRIES,
    skipRateLimit = false,
    headers = {},
  } = opts;

  let lastError: Error | null = null;
  let lastResult: PolicyFetchResult | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      // Exponential backoff with jitter
      const backoff =
        BASE_BACKOFF_MS * Math.pow(2, attempt - 1) +
        Math.random() * BASE_BACKOFF_MS;
      console.log(
        `[fetchWithPolicy] Retry ${attempt}/${maxRetries} for ${redact(url)} (waiting ${Math.round(backoff)}ms)`
      );
      await new Promise((resolve) => setTimeout(resolve, backoff));
    }

    if (!skipRateLimit) {
      await waitForRateLimit(url);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: {
          "User-Agent": USER_AGENT,
          Accept: "application/json",
          ...headers,
        },
        redirect: "follow",
      });

      const content = await response.text();
      lastResult = {
        httpStatus: response.status,
        content,
        finalUrl: response.url || url,
      };

      if (!isRetryableStatus(response.status)) return lastResult;
      console.warn(
        `[fetchWithPolicy] HTTP ${response.status} from ${redact(url)} (attempt ${attempt + 1})`
      );
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (lastError.name === "AbortError") {
        console.warn(
          `[fetchWithPolicy] Timeout after ${timeoutMs}ms for ${redact(url)}`
        );
      } else {
        console.warn(
          `[fetchWithPolicy] Attempt ${attempt + 1} failed for ${redact(url)}: ${lastError.message}`
        );
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  if (lastResult) return lastResult;

  throw new Error(
    `[fetchWithPolicy] All ${maxRetries + 1} attempts failed for ${redact(url)}: ${lastError?.message}`
  );
}

/** Hide the API key in log lines */
export function redact(url: string): string {
  return url.replace(/([?&]key=)[^&]+/i, "$1***");
}
