/**
 * Per-host pacing for outbound API calls. Enforces a minimum delay between
 * requests to the same host. Defaults to 200ms.
 */

const lastRequestTime = new Map<string, number>();

const DEFAULT_DELAY_MS = 200;

/** Per-host delay overrides in milliseconds */
const hostDelays: Record<string, number> = {
  "maps.googleapis.com": 100,
};

function getHost(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return "unknown";
  }
}

/**
 * Wait until enough time has passed since the last request to this host.
 * Call this BEFORE making a fetch to the given URL.
 */
export async function waitForRateLimit(url: string): Promise<void> {
  const host = getHost(url);
  const delay = hostDelays[host] ?? DEFAULT_DELAY_MS;
  const last = lastRequestTime.get(host) ?? 0;
  const elapsed = Date.now() - last;

  if (elapsed < delay) {
    const wait = delay - elapsed;
    await new Promise((resolve) => setTimeout(resolve, wait));
  }

  lastRequestTime.set(host, Date.now());
}
